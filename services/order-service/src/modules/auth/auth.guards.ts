import { CanActivate, ExecutionContext, Inject, Injectable } from "@nestjs/common";
import { AuthenticationError, AuthorizationError } from "../../common/errors";
import { IDENTITY_VERIFIER } from "../../common/tokens";
import { AdminAuthService } from "./admin-auth.service";
import { IdentityVerifier } from "./identity-verifier";
import { AuthenticatedRequest, extractBearer } from "./principal";

@Injectable()
export class UserAuthGuard implements CanActivate {
  constructor(@Inject(IDENTITY_VERIFIER) private readonly verifier: IdentityVerifier) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearer(request.headers.authorization);
    const claims = await this.verifier.verify(token);
    if (!claims) throw new AuthenticationError("Invalid or expired token");

    request.principal = { kind: "user", id: claims.sub };
    return true;
  }
}

@Injectable()
export class AdminAuthGuard implements CanActivate {
  constructor(
    private readonly adminAuth: AdminAuthService,
    @Inject(IDENTITY_VERIFIER) private readonly verifier: IdentityVerifier,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearer(request.headers.authorization);
    const admin = await this.adminAuth.resolveToken(token);
    if (admin) {
      request.principal = { kind: "admin", id: admin.id };
      return true;
    }

    // A signed-in user without admin rights is told so, anything else is unauthenticated.
    if (await this.verifier.verify(token)) throw new AuthorizationError("Admin access required");
    throw new AuthenticationError("Invalid admin token");
  }
}
