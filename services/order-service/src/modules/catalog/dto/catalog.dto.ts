import { IsBoolean, IsInt, IsNumber, IsOptional, IsPositive, IsString, Matches, Min } from "class-validator";

const NOT_BLANK = /\S/;

export class CreateProductDto {
  @IsString({ message: "name is required" })
  @Matches(NOT_BLANK, { message: "name is required" })
  name!: string;

  @IsNumber({ maxDecimalPlaces: 2 }, { message: "price must be a number with at most 2 decimal places" })
  @IsPositive({ message: "price must be greater than 0" })
  price!: number;

  @IsOptional()
  @IsString()
  category?: string;

  @IsOptional()
  @IsString()
  imageUrl?: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsBoolean()
  inStock?: boolean;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class UpdateProductDto {
  @IsOptional()
  @IsString({ message: "name is required" })
  @Matches(NOT_BLANK, { message: "name is required" })
  name?: string;

  @IsOptional()
  @IsNumber({ maxDecimalPlaces: 2 }, { message: "price must be a number with at most 2 decimal places" })
  @IsPositive({ message: "price must be greater than 0" })
  price?: number;

  @IsOptional()
  @IsString()
  category?: string;

  @IsOptional()
  @IsString()
  imageUrl?: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsBoolean()
  inStock?: boolean;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class CreateCategoryDto {
  @IsString({ message: "name is required" })
  @Matches(NOT_BLANK, { message: "name is required" })
  name!: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  sortOrder?: number;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class UpdateCategoryDto {
  @IsOptional()
  @IsString({ message: "name is required" })
  @Matches(NOT_BLANK, { message: "name is required" })
  name?: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  sortOrder?: number;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}
