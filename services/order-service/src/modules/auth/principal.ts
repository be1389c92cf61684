import { Principal } from "@orderdesk/types";
import { createParamDecorator, ExecutionContext } from "@nestjs/common";
import { FastifyRequest } from "fastify";
import { AuthenticationError } from "../../common/errors";

export type AuthenticatedRequest = FastifyRequest & { principal?: Principal };

export function extractBearer(authorization: string | undefined): string {
  if (!authorization || !authorization.startsWith("Bearer ")) {
    throw new AuthenticationError("Missing bearer token");
  }
  const token = authorization.slice("Bearer ".length).trim();
  if (!token) throw new AuthenticationError("Missing bearer token");
  return token;
}

export const CurrentPrincipal = createParamDecorator((_: unknown, context: ExecutionContext): Principal => {
  const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
  if (!request.principal) throw new AuthenticationError();
  return request.principal;
});
