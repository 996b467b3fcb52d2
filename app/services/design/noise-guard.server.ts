/**
 * Heuristic "is this message noise" predicate.
 *
 * Used to veto a RESET triggered by input that carries no real intent: a reply
 * shorter than `minLength` characters, or a single unbroken token longer than
 * `maxUnbrokenLength` (keyboard mash, a pasted hash).
 */

export interface NoiseThresholds {
  minLength: number;
  maxUnbrokenLength: number;
}

export const NOISE_THRESHOLDS: NoiseThresholds = {
  minLength: 3,
  maxUnbrokenLength: 20,
};

export function isLikelyNoise(text: string, thresholds: NoiseThresholds = NOISE_THRESHOLDS): boolean {
  const trimmed = text.trim();
  if (trimmed.length < thresholds.minLength) {
    return true;
  }

  const words = trimmed.split(/\s+/).filter(Boolean);
  return words.length === 1 && trimmed.length > thresholds.maxUnbrokenLength;
}
