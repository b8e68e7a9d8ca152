// lib/server/reqid.ts
import { randomBytes } from "crypto";

/** 12 random bytes as base64url: 16 URL-safe characters. */
export function genRequestId(): string {
  return randomBytes(12).toString("base64url");
}
