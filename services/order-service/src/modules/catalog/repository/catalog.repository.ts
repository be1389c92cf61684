import { DocumentData, DocumentStore, StoredDocument } from "@orderdesk/database";
import { CategoryRecord, ProductRecord, ProductListQuery } from "@orderdesk/types";
import { Inject, Injectable } from "@nestjs/common";
import { booleanField, numberField, stringField } from "../../../common/document-fields";
import { DOCUMENT_STORE } from "../../../common/tokens";

const PRODUCTS = "products";
const CATEGORIES = "categories";

export function categoryNameKey(name: string): string {
  return name.trim().toLowerCase();
}

@Injectable()
export class CatalogRepository {
  constructor(@Inject(DOCUMENT_STORE) private readonly store: DocumentStore) {}

  async listProducts(query: ProductListQuery): Promise<ProductRecord[]> {
    const docs = await this.store.query(PRODUCTS, {
      ...(query.activeOnly ? { where: [{ field: "isActive", value: true }] } : {}),
      orderBy: { field: "name", direction: "asc" },
      limit: query.limit,
    });
    return docs.flatMap((doc) => {
      const product = this.mapProduct(doc);
      return product ? [product] : [];
    });
  }

  async findProduct(productId: string): Promise<ProductRecord | null> {
    const doc = await this.store.get(PRODUCTS, productId);
    return doc ? this.mapProduct(doc) : null;
  }

  async insertProduct(data: DocumentData): Promise<ProductRecord | null> {
    const id = await this.store.add(PRODUCTS, data);
    return this.findProduct(id);
  }

  async updateProduct(productId: string, patch: DocumentData): Promise<ProductRecord | null> {
    const doc = await this.store.update(PRODUCTS, productId, patch);
    return doc ? this.mapProduct(doc) : null;
  }

  deleteProduct(productId: string): Promise<boolean> {
    return this.store.delete(PRODUCTS, productId);
  }

  async listCategories(): Promise<CategoryRecord[]> {
    const docs = await this.store.query(CATEGORIES, { orderBy: { field: "sortOrder", direction: "asc" } });
    return docs.flatMap((doc) => {
      const category = this.mapCategory(doc);
      return category ? [category] : [];
    });
  }

  async findCategoryByName(name: string): Promise<CategoryRecord | null> {
    const docs = await this.store.query(CATEGORIES, {
      where: [{ field: "nameKey", value: categoryNameKey(name) }],
      limit: 1,
    });
    const doc = docs[0];
    return doc ? this.mapCategory(doc) : null;
  }

  async insertCategory(data: DocumentData): Promise<CategoryRecord | null> {
    const id = await this.store.add(CATEGORIES, data);
    const doc = await this.store.get(CATEGORIES, id);
    return doc ? this.mapCategory(doc) : null;
  }

  async updateCategory(categoryId: string, patch: DocumentData): Promise<CategoryRecord | null> {
    const doc = await this.store.update(CATEGORIES, categoryId, patch);
    return doc ? this.mapCategory(doc) : null;
  }

  deleteCategory(categoryId: string): Promise<boolean> {
    return this.store.delete(CATEGORIES, categoryId);
  }

  private mapProduct(doc: StoredDocument): ProductRecord | null {
    const name = stringField(doc.data, "name");
    const price = numberField(doc.data, "price");
    if (!name || price === undefined) return null;

    const category = stringField(doc.data, "category");
    const imageUrl = stringField(doc.data, "imageUrl");
    const createdAtIso = stringField(doc.data, "createdAtIso") || "";
    return {
      id: doc.id,
      name,
      price,
      ...(category ? { category } : {}),
      ...(imageUrl ? { imageUrl } : {}),
      description: stringField(doc.data, "description") || "",
      inStock: booleanField(doc.data, "inStock") ?? true,
      isActive: booleanField(doc.data, "isActive") ?? true,
      createdAtIso,
      updatedAtIso: stringField(doc.data, "updatedAtIso") || createdAtIso,
    };
  }

  private mapCategory(doc: StoredDocument): CategoryRecord | null {
    const name = stringField(doc.data, "name");
    if (!name) return null;

    const description = stringField(doc.data, "description");
    const createdAtIso = stringField(doc.data, "createdAtIso") || "";
    return {
      id: doc.id,
      name,
      ...(description ? { description } : {}),
      sortOrder: numberField(doc.data, "sortOrder") ?? 0,
      isActive: booleanField(doc.data, "isActive") ?? true,
      createdAtIso,
      updatedAtIso: stringField(doc.data, "updatedAtIso") || createdAtIso,
    };
  }
}
