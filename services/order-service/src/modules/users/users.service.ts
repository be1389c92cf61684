import { CreateUserRequest, Principal, UserProfile } from "@orderdesk/types";
import { Injectable, Logger } from "@nestjs/common";
import { AuthorizationError, NotFoundError } from "../../common/errors";
import { assertValidPayload } from "../../common/validation";
import { CreateUserDto } from "./dto/create-user.dto";
import { UsersRepository } from "./repository/users.repository";

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(private readonly users: UsersRepository) {}

  /** Users see only their own profile; admins see any. */
  async getProfile(userId: string, requester: Principal): Promise<UserProfile> {
    if (requester.kind !== "admin" && requester.id !== userId) {
      throw new AuthorizationError("You can only view your own profile");
    }
    const user = await this.users.findById(userId);
    if (!user) throw new NotFoundError("User not found");
    return user;
  }

  async saveProfile(requester: Principal, input: CreateUserRequest): Promise<UserProfile> {
    assertValidPayload(CreateUserDto, input);
    const userId = input.userId.trim();
    if (requester.kind !== "admin" && requester.id !== userId) {
      throw new AuthorizationError("You can only create your own profile");
    }

    const displayName = input.displayName?.trim();
    const user = await this.users.save(
      {
        userId,
        email: input.email.trim().toLowerCase(),
        displayName: displayName || null,
        phoneNumbers: (input.phoneNumbers || []).map((phone) => phone.trim()).filter((phone) => phone.length > 0),
      },
      new Date().toISOString(),
    );
    this.logger.log(`Profile saved for ${userId}`);
    return user;
  }

  listProfiles(): Promise<UserProfile[]> {
    return this.users.list();
  }
}
