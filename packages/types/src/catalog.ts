export interface CategoryRecord {
  id: string;
  name: string;
  description?: string;
  sortOrder: number;
  isActive: boolean;
  createdAtIso: string;
  updatedAtIso: string;
}

export interface UpsertCategoryRequest {
  name: string;
  description?: string;
  sortOrder?: number;
  isActive?: boolean;
}

export interface ProductRecord {
  id: string;
  name: string;
  price: number;
  category?: string;
  imageUrl?: string;
  description: string;
  inStock: boolean;
  isActive: boolean;
  createdAtIso: string;
  updatedAtIso: string;
}

export interface CreateProductRequest {
  name: string;
  price: number;
  category?: string;
  imageUrl?: string;
  description?: string;
  inStock?: boolean;
  isActive?: boolean;
}

export type UpdateProductRequest = Partial<CreateProductRequest>;

export interface ProductListQuery {
  activeOnly: boolean;
  limit: number;
}
