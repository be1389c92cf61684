import { AdminLoginResponse, AdminRecord } from "@orderdesk/types";
import { Injectable, Logger } from "@nestjs/common";
import { AuthenticationError, ConflictError, ValidationError } from "../../common/errors";
import { hashPassword, verifyPassword } from "./password";
import { AdminRepository } from "./repository/admin.repository";

@Injectable()
export class AdminAuthService {
  private readonly logger = new Logger(AdminAuthService.name);

  constructor(private readonly admins: AdminRepository) {}

  async login(email: string, password: string): Promise<AdminLoginResponse> {
    const admin = await this.admins.findByEmail(email);
    if (!admin || !verifyPassword(password, admin.passwordHash)) {
      throw new AuthenticationError("Invalid email or password");
    }

    this.logger.log(`Admin ${admin.id} signed in`);
    return {
      success: true,
      token: admin.id,
      adminId: admin.id,
      email: admin.email,
      name: admin.name,
    };
  }

  /** Admin tokens are the admin document id. */
  resolveToken(token: string): Promise<AdminRecord | null> {
    if (!token || token.includes("/")) return Promise.resolve(null);
    return this.admins.findById(token);
  }

  async createAdmin(email: string, password: string, name?: string): Promise<AdminRecord> {
    const normalizedEmail = email.trim().toLowerCase();
    if (!normalizedEmail.includes("@")) throw new ValidationError("A valid email is required");
    if (password.length < 8) throw new ValidationError("Password must be at least 8 characters");
    if (await this.admins.findByEmail(normalizedEmail)) {
      throw new ConflictError(`Admin ${normalizedEmail} already exists`);
    }

    return this.admins.create({
      email: normalizedEmail,
      name: name?.trim() || "Admin",
      passwordHash: hashPassword(password),
      createdAtIso: new Date().toISOString(),
    });
  }
}
