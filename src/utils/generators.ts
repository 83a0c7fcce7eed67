import { randomUUID } from "crypto";

export function generateUUID(): string {
  return randomUUID();
}

/**
 * Matrix username unique per second of wall-clock time
 */
export function generateClientUsername(now: number = Date.now(), tag?: string): string {
  const base = `user_${Math.floor(now / 1000)}`;
  if (!tag) return base;
  // Matrix localparts: a-z, 0-9, . _ = - /
  const suffix = tag.toLowerCase().replace(/[^a-z0-9._=\-/]/g, "");
  return suffix ? `${base}_${suffix}` : base;
}
