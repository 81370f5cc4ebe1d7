const UNIT_MS = { d: 86_400_000, h: 3_600_000, m: 60_000, s: 1_000 } as const;

/**
 * Parse a cache TTL such as "1d", "24h", "1440m", "86400s" or bare "86400"
 * (seconds). Returns milliseconds, or null when the text is not a duration.
 */
export function parseDuration(text: string | undefined): number | null {
  if (!text) return null;
  const m = /^(\d+)([dhms]?)$/.exec(text.trim());
  if (!m) return null;
  const n = Number(m[1]);
  const unit = m[2] === "d" || m[2] === "h" || m[2] === "m" ? m[2] : "s";
  const ms = n * UNIT_MS[unit];
  return Number.isSafeInteger(ms) ? ms : null;
}

export function formatDuration(ms: number): string {
  for (const unit of ["d", "h", "m"] as const) {
    if (ms >= UNIT_MS[unit] && ms % UNIT_MS[unit] === 0) return `${ms / UNIT_MS[unit]}${unit}`;
  }
  return `${ms / 1000}s`;
}
