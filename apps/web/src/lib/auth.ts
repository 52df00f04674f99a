/**
 * Shared authentication utilities for Next.js API routes.
 *
 * Provides:
 * - getEnv: Safe environment variable reading
 * - secureCompare: Timing-safe string comparison
 * - checkAdminKey: Operator authentication check (cache administration)
 */

import { timingSafeEqual } from "node:crypto";

export const ADMIN_KEY_HEADER = "x-admin-key";

type EnvSource = Record<string, string | undefined>;

/**
 * Reads an environment variable, returning empty string if missing or whitespace-only.
 */
export function getEnv(name: string, env: EnvSource = process.env): string {
  const v = env[name];
  return v && v.trim() ? v : "";
}

/**
 * Timing-safe string comparison. Inputs of different length are padded so the
 * comparison time does not leak the expected length.
 */
export function secureCompare(expected: string, provided: string | null): boolean {
  if (provided === null) return false;
  const expectedBuffer = Buffer.from(expected);
  const providedBuffer = Buffer.from(provided);
  const maxLength = Math.max(expectedBuffer.length, providedBuffer.length);
  const expectedPadded = Buffer.alloc(maxLength);
  const providedPadded = Buffer.alloc(maxLength);
  expectedBuffer.copy(expectedPadded);
  providedBuffer.copy(providedPadded);
  const matched = timingSafeEqual(expectedPadded, providedPadded);
  return matched && expectedBuffer.length === providedBuffer.length;
}

/**
 * Checks operator authentication via the x-admin-key header against TL_ADMIN_KEY.
 *
 * No key set: allowed outside production, denied in production.
 */
export function checkAdminKey(req: Request, env: EnvSource = process.env): boolean {
  const expectedKey = getEnv("TL_ADMIN_KEY", env);
  if (!expectedKey) {
    return env.NODE_ENV !== "production";
  }
  return secureCompare(expectedKey, req.headers.get(ADMIN_KEY_HEADER));
}
