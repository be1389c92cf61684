import { DocumentData } from "@orderdesk/database";
import {
  CategoryRecord,
  CreateProductRequest,
  ProductRecord,
  UpdateProductRequest,
  UpsertCategoryRequest,
} from "@orderdesk/types";
import { Inject, Injectable, Logger } from "@nestjs/common";
import { OrderServiceEnv } from "../../config/env";
import { compactDocument } from "../../common/document-fields";
import { ConflictError, NotFoundError, ValidationError } from "../../common/errors";
import { SERVICE_ENV } from "../../common/tokens";
import { CategoryCache } from "./category-cache";
import { CatalogRepository, categoryNameKey } from "./repository/catalog.repository";

export const MAX_PRODUCT_PAGE = 100;

function byCategoryOrder(left: CategoryRecord, right: CategoryRecord): number {
  return left.sortOrder - right.sortOrder || left.name.localeCompare(right.name);
}

@Injectable()
export class CatalogService {
  private readonly logger = new Logger(CatalogService.name);
  readonly categoryCache: CategoryCache;

  constructor(
    private readonly catalog: CatalogRepository,
    @Inject(SERVICE_ENV) env: OrderServiceEnv,
  ) {
    this.categoryCache = new CategoryCache(
      async () => (await this.catalog.listCategories()).sort(byCategoryOrder),
      env.categoryCacheTtlSeconds * 1000,
    );
  }

  listProducts(activeOnly: boolean, limit: number): Promise<ProductRecord[]> {
    const bounded = Number.isFinite(limit) && limit > 0 ? Math.min(Math.floor(limit), MAX_PRODUCT_PAGE) : MAX_PRODUCT_PAGE;
    return this.catalog.listProducts({ activeOnly, limit: bounded });
  }

  async createProduct(input: CreateProductRequest): Promise<ProductRecord> {
    const nowIso = new Date().toISOString();
    const product = await this.catalog.insertProduct(compactDocument({
      name: input.name.trim(),
      price: input.price,
      category: input.category,
      imageUrl: input.imageUrl,
      description: input.description ?? "",
      inStock: input.inStock ?? true,
      isActive: input.isActive ?? true,
      createdAtIso: nowIso,
      updatedAtIso: nowIso,
    }));
    if (!product) throw new Error("Product was not readable after insert");
    this.logger.log(`Product ${product.id} created`);
    return product;
  }

  async updateProduct(productId: string, input: UpdateProductRequest): Promise<ProductRecord> {
    const patch: DocumentData = compactDocument({
      name: input.name?.trim(),
      price: input.price,
      category: input.category,
      imageUrl: input.imageUrl,
      description: input.description,
      inStock: input.inStock,
      isActive: input.isActive,
      updatedAtIso: new Date().toISOString(),
    });
    const product = await this.catalog.updateProduct(productId, patch);
    if (!product) throw new NotFoundError("Product not found");
    return product;
  }

  async deleteProduct(productId: string): Promise<void> {
    if (!(await this.catalog.deleteProduct(productId))) throw new NotFoundError("Product not found");
  }

  async activeCategories(): Promise<CategoryRecord[]> {
    return (await this.categoryCache.get()).filter((category) => category.isActive);
  }

  allCategories(): Promise<CategoryRecord[]> {
    return this.categoryCache.get();
  }

  async createCategory(input: UpsertCategoryRequest): Promise<CategoryRecord> {
    const name = this.requireName(input.name);
    if (await this.catalog.findCategoryByName(name)) {
      throw new ConflictError(`Category "${name}" already exists`);
    }

    const nowIso = new Date().toISOString();
    const category = await this.catalog.insertCategory(compactDocument({
      name,
      nameKey: categoryNameKey(name),
      description: input.description,
      sortOrder: input.sortOrder ?? 0,
      isActive: input.isActive ?? true,
      createdAtIso: nowIso,
      updatedAtIso: nowIso,
    }));
    this.categoryCache.invalidate();
    if (!category) throw new Error("Category was not readable after insert");
    return category;
  }

  async updateCategory(categoryId: string, input: Partial<UpsertCategoryRequest>): Promise<CategoryRecord> {
    const name = input.name === undefined ? undefined : this.requireName(input.name);
    if (name !== undefined) {
      const existing = await this.catalog.findCategoryByName(name);
      if (existing && existing.id !== categoryId) {
        throw new ConflictError(`Category "${name}" already exists`);
      }
    }

    const category = await this.catalog.updateCategory(categoryId, compactDocument({
      name,
      nameKey: name === undefined ? undefined : categoryNameKey(name),
      description: input.description,
      sortOrder: input.sortOrder,
      isActive: input.isActive,
      updatedAtIso: new Date().toISOString(),
    }));
    if (!category) throw new NotFoundError("Category not found");
    this.categoryCache.invalidate();
    return category;
  }

  async deleteCategory(categoryId: string): Promise<void> {
    if (!(await this.catalog.deleteCategory(categoryId))) throw new NotFoundError("Category not found");
    this.categoryCache.invalidate();
  }

  private requireName(raw: string): string {
    const name = raw.trim();
    if (!name) throw new ValidationError("name is required", [{ field: "name", message: "name is required" }]);
    return name;
  }
}
