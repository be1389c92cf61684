import jwt from "jsonwebtoken";
import { createTestContext, seedAdmin, TestContext } from "../../../test/support";
import { AdminAuthService } from "./admin-auth.service";
import { JwtIdentityVerifier } from "./identity-verifier";
import { hashPassword, verifyPassword } from "./password";
import { extractBearer } from "./principal";

describe("passwords", () => {
  it("verifies the password a hash was made from", () => {
    const stored = hashPassword("correct horse", "fixed-salt");

    expect(stored.startsWith("scrypt$fixed-salt$")).toBe(true);
    expect(verifyPassword("correct horse", stored)).toBe(true);
    expect(verifyPassword("wrong horse", stored)).toBe(false);
  });

  it("rejects hashes in another format", () => {
    expect(verifyPassword("anything", "plain-text")).toBe(false);
    expect(verifyPassword("anything", "bcrypt$salt$abcd")).toBe(false);
  });
});

describe("JwtIdentityVerifier", () => {
  const verifier = new JwtIdentityVerifier("test-secret");

  it("returns the subject of a valid token", async () => {
    const token = jwt.sign({ sub: "alice", email: "alice@example.com" }, "test-secret", { algorithm: "HS256" });

    await expect(verifier.verify(token)).resolves.toEqual({ sub: "alice", email: "alice@example.com" });
  });

  it("rejects tokens signed with another secret, expired or without a subject", async () => {
    const foreign = jwt.sign({ sub: "alice" }, "other-secret", { algorithm: "HS256" });
    const expired = jwt.sign({ sub: "alice", exp: Math.floor(Date.now() / 1000) - 60 }, "test-secret");
    const anonymous = jwt.sign({ email: "alice@example.com" }, "test-secret");

    await expect(verifier.verify(foreign)).resolves.toBeNull();
    await expect(verifier.verify(expired)).resolves.toBeNull();
    await expect(verifier.verify(anonymous)).resolves.toBeNull();
    await expect(verifier.verify("not-a-jwt")).resolves.toBeNull();
  });
});

describe("extractBearer", () => {
  it("reads the token after the scheme", () => {
    expect(extractBearer("Bearer abc ")).toBe("abc");
  });

  it.each([undefined, "", "Basic abc", "Bearer   "])("rejects %p", (header) => {
    expect(() => extractBearer(header)).toThrow("Missing bearer token");
  });
});

describe("AdminAuthService", () => {
  let ctx: TestContext;
  let service: AdminAuthService;

  beforeEach(async () => {
    ctx = await createTestContext();
    service = ctx.module.get(AdminAuthService);
  });

  afterEach(async () => {
    await ctx.module.close();
  });

  it("signs admins in by email regardless of case", async () => {
    await seedAdmin(ctx.store, { id: "admin-1", email: "ops@example.com", name: "Ops" });

    await expect(service.login("OPS@example.com", "test-password")).resolves.toEqual({
      success: true,
      token: "admin-1",
      adminId: "admin-1",
      email: "ops@example.com",
      name: "Ops",
    });
    await expect(service.login("ops@example.com", "nope")).rejects.toMatchObject({ message: "Invalid email or password" });
    await expect(service.login("ghost@example.com", "test-password")).rejects.toMatchObject({ message: "Invalid email or password" });
  });

  it("resolves admin tokens to their record", async () => {
    await seedAdmin(ctx.store, { id: "admin-1", email: "ops@example.com" });

    await expect(service.resolveToken("admin-1")).resolves.toMatchObject({ id: "admin-1", email: "ops@example.com" });
    await expect(service.resolveToken("admin-2")).resolves.toBeNull();
    await expect(service.resolveToken("admins/admin-1")).resolves.toBeNull();
  });

  it("creates admins once per email", async () => {
    const admin = await service.createAdmin(" New@Example.com ", "long-enough", "Night Shift");

    expect(admin).toMatchObject({ email: "new@example.com", name: "Night Shift" });
    await expect(service.login("new@example.com", "long-enough")).resolves.toMatchObject({ adminId: admin.id });
    await expect(service.createAdmin("new@example.com", "long-enough")).rejects.toMatchObject({
      message: "Admin new@example.com already exists",
    });
    await expect(service.createAdmin("other@example.com", "short")).rejects.toMatchObject({
      message: "Password must be at least 8 characters",
    });
  });
});
