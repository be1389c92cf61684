import { NotificationRecord, Principal } from "@orderdesk/types";
import { Body, Controller, Get, HttpCode, Post, UseGuards } from "@nestjs/common";
import { UserAuthGuard } from "../auth/auth.guards";
import { RegisterDeviceTokenDto } from "./dto/register-device-token.dto";
import { CurrentPrincipal } from "../auth/principal";
import { NotificationsService } from "./notifications.service";

@Controller()
@UseGuards(UserAuthGuard)
export class NotificationsController {
  constructor(private readonly notifications: NotificationsService) {}

  @Get("notifications")
  list(@CurrentPrincipal() principal: Principal): Promise<NotificationRecord[]> {
    return this.notifications.listForUser(principal.id);
  }

  @Post("users/fcm-token")
  @HttpCode(200)
  async registerDevice(
    @CurrentPrincipal() principal: Principal,
    @Body() dto: RegisterDeviceTokenDto,
  ): Promise<{ success: true }> {
    await this.notifications.registerUserDevice(principal.id, dto.token);
    return { success: true };
  }
}
