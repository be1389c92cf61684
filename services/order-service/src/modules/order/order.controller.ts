import { OrderAnalytics, OrderRecord, Principal, SubmitOrderResponse } from "@orderdesk/types";
import { Body, Controller, Delete, Get, Headers, HttpCode, Param, Post, Put, UseGuards } from "@nestjs/common";
import { UserAuthGuard } from "../auth/auth.guards";
import { CurrentPrincipal } from "../auth/principal";
import { CreateOrderDto, SubmitOrderDto, UpdateOrderDto } from "./dto/order.dto";
import { OrderService } from "./order.service";

@Controller()
@UseGuards(UserAuthGuard)
export class OrderController {
  constructor(private readonly orderService: OrderService) {}

  @Get("orders")
  async list(@CurrentPrincipal() principal: Principal): Promise<{ orders: OrderRecord[] }> {
    return { orders: await this.orderService.listOrders({ userId: principal.id }) };
  }

  @Post("orders")
  async create(
    @CurrentPrincipal() principal: Principal,
    @Body() dto: CreateOrderDto,
  ): Promise<{ success: true; orderId: string; order: OrderRecord }> {
    const order = await this.orderService.createOrder(principal.id, dto);
    return { success: true, orderId: order.orderId, order };
  }

  @Get("orders/analytics")
  analytics(@CurrentPrincipal() principal: Principal): Promise<OrderAnalytics> {
    return this.orderService.analytics({ userId: principal.id });
  }

  @Get("orders/:id")
  async get(@CurrentPrincipal() principal: Principal, @Param("id") id: string): Promise<{ order: OrderRecord }> {
    return { order: await this.orderService.getOrder(id, principal) };
  }

  @Put("orders/:id")
  async update(
    @CurrentPrincipal() principal: Principal,
    @Param("id") id: string,
    @Body() dto: UpdateOrderDto,
  ): Promise<{ success: true; order: OrderRecord }> {
    return { success: true, order: await this.orderService.updateOrder(id, principal, dto) };
  }

  @Delete("orders/:id")
  async remove(@CurrentPrincipal() principal: Principal, @Param("id") id: string): Promise<{ success: true }> {
    await this.orderService.deleteOrder(id, principal);
    return { success: true };
  }

  @Post("order/submit")
  @HttpCode(200)
  submit(
    @CurrentPrincipal() principal: Principal,
    @Body() dto: SubmitOrderDto,
    @Headers("x-idempotency-key") idempotencyKey?: string,
  ): Promise<SubmitOrderResponse> {
    return this.orderService.submitOrder(principal.id, dto.order, idempotencyKey);
  }
}
