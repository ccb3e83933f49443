export type LocationQuery =
  | { readonly kind: 'coordinates'; readonly lat: number; readonly lon: number }
  | { readonly kind: 'name'; readonly name: string };

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const parseDecimal = (value: string): number | null => {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  const numeric = Number(trimmed);
  return Number.isFinite(numeric) ? numeric : null;
};

// "lat,lon" is tried first; anything that does not parse as two decimals is a place name.
export const parseLocationQuery = (raw: string): LocationQuery => {
  const location = raw.trim();
  if (location.includes(',')) {
    const parts = location.split(',');
    if (parts.length === 2) {
      const lat = parseDecimal(parts[0]);
      const lon = parseDecimal(parts[1]);
      if (lat !== null && lon !== null) {
        return { kind: 'coordinates', lat, lon };
      }
    }
  }
  return { kind: 'name', name: location };
};

export const locationQueryParams = (query: LocationQuery): Record<string, string> =>
  query.kind === 'coordinates' ? { lat: String(query.lat), lon: String(query.lon) } : { q: query.name };
