/**
 * Parse duration strings into milliseconds.
 * Supports formats like: 400ms, 12s, 2m, 1h, or a bare millisecond count.
 */
export function parseDuration(duration: string | number): number {
  if (typeof duration === 'number') {
    if (!Number.isFinite(duration) || duration < 0) {
      throw new Error(`Invalid duration: ${duration}`);
    }
    return duration;
  }

  const match = duration.trim().match(/^(\d+(?:\.\d+)?)(ms|s|m|h)?$/);
  if (!match) {
    throw new Error(`Invalid duration format: ${duration}. Use formats like 400ms, 12s, 2m, 1h`);
  }

  const [, value, unit] = match;
  const amount = parseFloat(value);

  switch (unit) {
    case undefined:
    case 'ms':
      return amount;
    case 's':
      return amount * 1000;
    case 'm':
      return amount * 60 * 1000;
    case 'h':
      return amount * 60 * 60 * 1000;
    default:
      throw new Error(`Unknown time unit: ${unit}`);
  }
}

/**
 * Elapsed wall time in seconds since `startedAt` (a Date.now() value)
 */
export function elapsedSeconds(startedAt: number, now: number = Date.now()): number {
  return (now - startedAt) / 1000;
}
