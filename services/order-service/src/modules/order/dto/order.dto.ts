import { CreateOrderRequest, ORDER_STATUSES, OrderPatch, OrderStatus, SubmitOrderRequest } from "@orderdesk/types";
import { Type } from "class-transformer";
import { ArrayNotEmpty, IsDefined, IsIn, IsObject, IsOptional, Matches, ValidateNested } from "class-validator";
import { IsFilled, IsPositiveAmount } from "../../../common/validators";

const CLIENT_ORDER_ID = /^[A-Za-z0-9_-]{1,64}$/;
const NESTED_ITEM = { each: true, message: "Each item must be an object" };

export class OrderLineItemDto {
  @IsFilled("Item productId is required")
  productId!: string;

  @IsFilled("Item name is required")
  name!: string;

  @IsPositiveAmount("Item quantity")
  quantity!: number;

  @IsPositiveAmount("Item price", true)
  price!: number;
}

/** Also validates orders that reach `OrderService` without passing the HTTP pipe. */
export class CreateOrderDto implements CreateOrderRequest {
  @IsOptional()
  @Matches(CLIENT_ORDER_ID, { message: "orderId may only contain letters, digits, '-' and '_'" })
  orderId?: string;

  @ArrayNotEmpty({ message: "Order must contain at least one item" })
  @ValidateNested(NESTED_ITEM)
  @Type(() => OrderLineItemDto)
  items!: OrderLineItemDto[];

  @IsPositiveAmount("totalAmount", true)
  totalAmount!: number;

  @IsFilled("deliveryLocation is required")
  deliveryLocation!: string;
}

export class SubmitOrderDto implements SubmitOrderRequest {
  @IsDefined({ message: "order is required" })
  @IsObject({ message: "order is required" })
  @ValidateNested()
  @Type(() => CreateOrderDto)
  order!: CreateOrderDto;
}

export class UpdateOrderDto implements OrderPatch {
  @IsOptional()
  @ArrayNotEmpty({ message: "Order must contain at least one item" })
  @ValidateNested(NESTED_ITEM)
  @Type(() => OrderLineItemDto)
  items?: OrderLineItemDto[];

  @IsOptional()
  @IsPositiveAmount("totalAmount", true)
  totalAmount?: number;

  @IsOptional()
  @IsFilled("deliveryLocation is required")
  deliveryLocation?: string;

  @IsOptional()
  @IsIn(ORDER_STATUSES, { message: `status must be one of ${ORDER_STATUSES.join(", ")}` })
  status?: OrderStatus;
}
