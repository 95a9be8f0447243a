// Epoch values below this are taken to be seconds (1e11 s is far past any real date).
const SECONDS_THRESHOLD = 1e11;

// Largest magnitude a Date can hold.
const MAX_EPOCH_MS = 8.64e15;

function inDateRange(ms: number): number | null {
  return Math.abs(ms) <= MAX_EPOCH_MS ? ms : null;
}

export function toEpochMs(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    return inDateRange(value < SECONDS_THRESHOLD ? Math.round(value * 1000) : Math.round(value));
  }
  const trimmed = value.trim();
  if (!trimmed) return null;
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) return toEpochMs(Number(trimmed));
  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? null : parsed;
}

export function toIsoTimestamp(epochMs: number | null): string | null {
  if (epochMs === null) return null;
  const date = new Date(epochMs);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}
