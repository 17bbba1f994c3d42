import { createHash, randomInt, randomUUID, timingSafeEqual } from "node:crypto";

export function sha256(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}

export function newId(): string {
  return randomUUID().replace(/-/g, "").slice(0, 20);
}

/** Six upper-case hex digits drawn from a 24-bit space. */
export function randomHardwareId(): string {
  return randomInt(0, 1 << 24).toString(16).toUpperCase().padStart(6, "0");
}

export function safeEqual(provided: string, expected: string): boolean {
  const a = Buffer.from(sha256(provided), "hex");
  const b = Buffer.from(sha256(expected), "hex");
  return timingSafeEqual(a, b);
}
