import { CreateUserResponse, Principal, UserProfile } from "@orderdesk/types";
import { Body, Controller, Get, HttpCode, Param, Post, UseGuards } from "@nestjs/common";
import { AdminAuthGuard, UserAuthGuard } from "../auth/auth.guards";
import { CurrentPrincipal } from "../auth/principal";
import { CreateUserDto } from "./dto/create-user.dto";
import { UsersService } from "./users.service";

@Controller("users")
@UseGuards(UserAuthGuard)
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Post()
  @HttpCode(201)
  async create(@CurrentPrincipal() principal: Principal, @Body() dto: CreateUserDto): Promise<CreateUserResponse> {
    return { success: true, user: await this.usersService.saveProfile(principal, dto) };
  }

  @Get(":id")
  async get(@CurrentPrincipal() principal: Principal, @Param("id") id: string): Promise<{ user: UserProfile }> {
    return { user: await this.usersService.getProfile(id, principal) };
  }
}

@Controller("admin/users")
@UseGuards(AdminAuthGuard)
export class AdminUsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get()
  async list(): Promise<{ users: UserProfile[] }> {
    return { users: await this.usersService.listProfiles() };
  }
}
