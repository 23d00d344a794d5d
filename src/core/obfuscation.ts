import type { ObfuscationOptions } from '../types/session.js';
import type { CapturedScript } from '../drivers/script-capture.js';

export const DEFAULT_OBFUSCATION_OPTIONS: ObfuscationOptions = {
  threshold: 5,
  densityThreshold: 0.05,
  sampleRatio: 0.25
};

const HEX_LITERAL = /0x[0-9a-fA-F]+/g;

/**
 * Density scan for hexadecimal literals.
 *
 * The leading `sampleRatio` of the body is scanned first; a low-density
 * prefix ends the scan early without looking at the rest. Once more than
 * `threshold` literals have been seen, the decision is made on the density
 * so far (over the prefix while inside it, over the whole body after).
 */
export function detectObfuscation(
  code: string,
  options: ObfuscationOptions = DEFAULT_OBFUSCATION_OPTIONS
): boolean {
  const { threshold, densityThreshold, sampleRatio } = options;
  const codeLength = code.length;
  if (codeLength === 0) return false;

  const sampleLength = Math.floor(codeLength * sampleRatio);
  let hexCount = 0;

  if (sampleLength > 0) {
    for (const _ of code.slice(0, sampleLength).matchAll(HEX_LITERAL)) {
      hexCount++;
      if (hexCount > threshold) {
        return hexCount / sampleLength > densityThreshold;
      }
    }

    if (hexCount / sampleLength <= densityThreshold) {
      return false;
    }
  }

  for (const _ of code.slice(sampleLength).matchAll(HEX_LITERAL)) {
    hexCount++;
    if (hexCount > threshold) {
      return hexCount / codeLength > densityThreshold;
    }
  }

  return hexCount / codeLength > densityThreshold;
}

/** True as soon as one captured script looks obfuscated */
export function hasObfuscatedScript(
  scripts: readonly CapturedScript[],
  options: ObfuscationOptions = DEFAULT_OBFUSCATION_OPTIONS
): boolean {
  return scripts.some(script => detectObfuscation(script.body, options));
}
