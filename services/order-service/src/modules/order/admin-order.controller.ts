import { OrderAnalytics, OrderCounterSnapshot, OrderRecord, Principal } from "@orderdesk/types";
import { Body, Controller, Delete, Get, Param, Put, UseGuards } from "@nestjs/common";
import { AdminAuthGuard } from "../auth/auth.guards";
import { CurrentPrincipal } from "../auth/principal";
import { UpdateOrderDto } from "./dto/order.dto";
import { OrderService } from "./order.service";

@Controller("admin")
@UseGuards(AdminAuthGuard)
export class AdminOrderController {
  constructor(private readonly orderService: OrderService) {}

  @Get("orders")
  async list(): Promise<{ orders: OrderRecord[] }> {
    return { orders: await this.orderService.listOrders({}) };
  }

  @Get("orders/recent")
  async recent(): Promise<{ orders: OrderRecord[] }> {
    return { orders: await this.orderService.recentOrders() };
  }

  @Get("orders/counter")
  counter(): Promise<OrderCounterSnapshot> {
    return this.orderService.counter();
  }

  @Get("analytics")
  analytics(): Promise<OrderAnalytics> {
    return this.orderService.analytics({});
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
}
