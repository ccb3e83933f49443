const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export const formatIsoDateUtc = (date: Date): string | null => {
  const ms = date.getTime();
  return Number.isFinite(ms) ? date.toISOString().slice(0, 10) : null;
};

// Rejects calendar overflow such as 2026-02-30, which Date would roll into March.
export const parseIsoDateUtc = (value: string | null | undefined): number | null => {
  if (typeof value !== 'string' || !ISO_DATE_PATTERN.test(value.trim())) {
    return null;
  }
  const trimmed = value.trim();
  const ms = Date.parse(`${trimmed}T00:00:00Z`);
  if (!Number.isFinite(ms) || new Date(ms).toISOString().slice(0, 10) !== trimmed) {
    return null;
  }
  return ms;
};

export const shiftIsoDateUtc = (isoDate: string, deltaDays: number): string | null => {
  const base = parseIsoDateUtc(isoDate);
  if (base === null || !Number.isFinite(deltaDays)) {
    return null;
  }
  return formatIsoDateUtc(new Date(base + Math.round(deltaDays) * DAY_MS));
};

/** Whole days from `fromIsoDate` to `toIsoDate`; negative when `toIsoDate` is earlier. */
export const daysBetweenIsoDates = (fromIsoDate: string, toIsoDate: string): number | null => {
  const from = parseIsoDateUtc(fromIsoDate);
  const to = parseIsoDateUtc(toIsoDate);
  if (from === null || to === null) {
    return null;
  }
  return Math.round((to - from) / DAY_MS);
};
