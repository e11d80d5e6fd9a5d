const UNIT_MULTIPLIER: Record<string, number> = {
  k: 1_000,
  m: 1_000_000,
};

/**
 * Parse a user-typed amount such as "50k", "$2.5m" or "1,200".
 * Returns undefined for anything that isn't a number, so the caller
 * simply leaves that constraint unset.
 */
export function parseAmount(token: string): number | undefined {
  const cleaned = token
    .trim()
    .toLowerCase()
    .replace(/[.,;:!?)]+$/, '')
    .replace(/^\$/, '')
    .replace(/,/g, '');

  const match = /^(\d+(?:\.\d+)?)([km])?$/.exec(cleaned);
  if (!match) return undefined;

  const value = Number(match[1]) * (match[2] ? UNIT_MULTIPLIER[match[2]] : 1);
  return Number.isFinite(value) ? value : undefined;
}

// Positive integers only ("top 0" or "top 2.5" set no limit)
export function parseCount(token: string): number | undefined {
  if (!/^\d+$/.test(token)) return undefined;
  const n = Number(token);
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
}
