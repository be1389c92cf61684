import { CategoryRecord, ProductRecord } from "@orderdesk/types";
import { Body, Controller, Delete, Get, Param, Post, Put, Query, UseGuards } from "@nestjs/common";
import { AdminAuthGuard } from "../auth/auth.guards";
import { CatalogService, MAX_PRODUCT_PAGE } from "./catalog.service";
import { CreateCategoryDto, CreateProductDto, UpdateCategoryDto, UpdateProductDto } from "./dto/catalog.dto";

@Controller()
export class CatalogController {
  constructor(private readonly catalog: CatalogService) {}

  @Get("products")
  async products(
    @Query("active") active?: string,
    @Query("limit") limit?: string,
  ): Promise<{ products: ProductRecord[] }> {
    const activeOnly = (active || "true").toLowerCase() === "true";
    return { products: await this.catalog.listProducts(activeOnly, Number(limit || MAX_PRODUCT_PAGE)) };
  }

  @Post("products")
  @UseGuards(AdminAuthGuard)
  async createProduct(@Body() dto: CreateProductDto): Promise<{ success: true; productId: string; product: ProductRecord }> {
    const product = await this.catalog.createProduct(dto);
    return { success: true, productId: product.id, product };
  }

  @Put("products/:id")
  @UseGuards(AdminAuthGuard)
  async updateProduct(@Param("id") id: string, @Body() dto: UpdateProductDto): Promise<{ success: true; product: ProductRecord }> {
    return { success: true, product: await this.catalog.updateProduct(id, dto) };
  }

  @Delete("products/:id")
  @UseGuards(AdminAuthGuard)
  async deleteProduct(@Param("id") id: string): Promise<{ success: true }> {
    await this.catalog.deleteProduct(id);
    return { success: true };
  }

  @Get("categories")
  async categories(): Promise<{ categories: CategoryRecord[] }> {
    return { categories: await this.catalog.activeCategories() };
  }
}

@Controller("admin/categories")
@UseGuards(AdminAuthGuard)
export class AdminCategoryController {
  constructor(private readonly catalog: CatalogService) {}

  @Get()
  async list(): Promise<{ categories: CategoryRecord[] }> {
    return { categories: await this.catalog.allCategories() };
  }

  @Post()
  async create(@Body() dto: CreateCategoryDto): Promise<{ success: true; category: CategoryRecord }> {
    return { success: true, category: await this.catalog.createCategory(dto) };
  }

  @Put(":id")
  async update(@Param("id") id: string, @Body() dto: UpdateCategoryDto): Promise<{ success: true; category: CategoryRecord }> {
    return { success: true, category: await this.catalog.updateCategory(id, dto) };
  }

  @Delete(":id")
  async remove(@Param("id") id: string): Promise<{ success: true }> {
    await this.catalog.deleteCategory(id);
    return { success: true };
  }
}
