import { createHash } from "node:crypto";

export const KAIROS_ID_LENGTH = 8;
export const KAIROS_ID_PATTERN = /^[0-9a-f]{8}$/;

/**
 * Correlation key for one run's scroll and log.
 * sha256("<epoch seconds>-<random>") truncated to 8 hex chars; collisions are not checked.
 */
export function generateKairosId(
  deps: { now?: () => number; random?: () => number } = {}
): string {
  const now = deps.now ?? Date.now;
  const random = deps.random ?? Math.random;

  const entropy = `${now() / 1000}-${random()}`;
  return createHash("sha256").update(entropy).digest("hex").slice(0, KAIROS_ID_LENGTH);
}
