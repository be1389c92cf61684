import { randomBytes, scryptSync, timingSafeEqual } from "crypto";

const SCHEME = "scrypt";

export function hashPassword(password: string, salt = randomBytes(16).toString("hex")): string {
  return `${SCHEME}$${salt}$${scryptSync(password, salt, 64).toString("hex")}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const [scheme, salt, hash] = stored.split("$");
  if (scheme !== SCHEME || !salt || !hash) return false;

  const hashBuf = Buffer.from(hash, "hex");
  const nextBuf = scryptSync(password, salt, 64);
  if (hashBuf.length !== nextBuf.length) return false;
  return timingSafeEqual(hashBuf, nextBuf);
}
