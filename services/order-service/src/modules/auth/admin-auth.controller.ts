import { AdminLoginResponse, Principal } from "@orderdesk/types";
import { Body, Controller, HttpCode, Post, UseGuards } from "@nestjs/common";
import { NotificationsService } from "../notifications/notifications.service";
import { AdminAuthService } from "./admin-auth.service";
import { AdminAuthGuard } from "./auth.guards";
import { RegisterDeviceTokenDto } from "../notifications/dto/register-device-token.dto";
import { AdminLoginDto } from "./dto/admin-auth.dto";
import { CurrentPrincipal } from "./principal";

@Controller("admin")
export class AdminAuthController {
  constructor(
    private readonly adminAuth: AdminAuthService,
    private readonly notifications: NotificationsService,
  ) {}

  @Post("login")
  @HttpCode(200)
  login(@Body() dto: AdminLoginDto): Promise<AdminLoginResponse> {
    return this.adminAuth.login(dto.email, dto.password);
  }

  @Post("fcm-token")
  @HttpCode(200)
  @UseGuards(AdminAuthGuard)
  async registerDevice(
    @CurrentPrincipal() principal: Principal,
    @Body() dto: RegisterDeviceTokenDto,
  ): Promise<{ success: true }> {
    await this.notifications.registerAdminDevice(principal.id, dto.token);
    return { success: true };
  }
}
