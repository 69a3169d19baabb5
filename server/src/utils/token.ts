import { randomBytes } from "crypto";

const TOKEN_BYTES = 16;
const TOKEN_PATTERN = /^[A-Za-z0-9_-]{22}$/;

/** 128 random bits, base64url encoded (22 characters). */
export function generateToken(): string {
  return randomBytes(TOKEN_BYTES).toString("base64url");
}

export function isWellFormedToken(value: string): boolean {
  return TOKEN_PATTERN.test(value);
}
