export type PrincipalKind = "user" | "admin";

export interface Principal {
  kind: PrincipalKind;
  id: string;
}

export interface AdminRecord {
  id: string;
  email: string;
  name: string;
  passwordHash: string;
  fcmToken?: string;
  fcmTokenUpdatedAtIso?: string;
  createdAtIso: string;
}

export interface AdminLoginRequest {
  email: string;
  password: string;
}

export interface AdminLoginResponse {
  success: true;
  token: string;
  adminId: string;
  email: string;
  name: string;
}

export interface IdentityClaims {
  sub: string;
  email?: string;
}
