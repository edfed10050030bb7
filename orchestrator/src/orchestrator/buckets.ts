import type { Granularity } from "./types.js";

const UNIT_MS: Record<Granularity, number> = {
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
};

export function parseTimestamp(value: string): Date | undefined {
  if (!value || value.trim().length === 0) {
    return undefined;
  }
  const epoch = Date.parse(value);
  return Number.isFinite(epoch) ? new Date(epoch) : undefined;
}

/** ISO string of the UTC bucket start containing `date`. */
export function bucketStart(date: Date, granularity: Granularity): string {
  const width = UNIT_MS[granularity];
  return new Date(Math.floor(date.getTime() / width) * width).toISOString();
}
