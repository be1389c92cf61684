import { IdentityClaims } from "@orderdesk/types";
import jwt from "jsonwebtoken";

export interface IdentityVerifier {
  /** Resolves the caller's claims, or null when the credential is not valid. */
  verify(token: string): Promise<IdentityClaims | null>;
}

export class JwtIdentityVerifier implements IdentityVerifier {
  constructor(private readonly secret: string) {}

  async verify(token: string): Promise<IdentityClaims | null> {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, { algorithms: ["HS256"] });
    } catch {
      return null;
    }
    if (typeof decoded === "string" || typeof decoded.sub !== "string" || !decoded.sub) return null;
    return {
      sub: decoded.sub,
      ...(typeof decoded.email === "string" ? { email: decoded.email } : {}),
    };
  }
}
