export const PLATFORMS = ["twitter", "youtube"] as const;

export type Platform = (typeof PLATFORMS)[number];

export const RAW_ITEM_KINDS = ["tweet", "video", "comment"] as const;

export type RawItemKind = (typeof RAW_ITEM_KINDS)[number];

export interface Engagement {
  readonly likes?: number;
  readonly views?: number;
  readonly replies?: number;
  readonly reposts?: number;
  readonly comments?: number;
}

/**
 * One post, video or comment as fetched from a platform. `text` and `timestamp` are passed
 * through as-is; an entry the API returned without them carries an empty string.
 */
export interface RawItem {
  readonly id: string;
  readonly source: Platform;
  readonly kind: RawItemKind;
  readonly text: string;
  readonly timestamp: string;
  readonly authorId: string;
  readonly url?: string;
  readonly engagement?: Engagement;
}

export interface TimeWindow {
  readonly from: Date;
  readonly to: Date;
}

export function isPlatform(value: unknown): value is Platform {
  return typeof value === "string" && (PLATFORMS as readonly string[]).includes(value);
}

export function isRawItemKind(value: unknown): value is RawItemKind {
  return typeof value === "string" && (RAW_ITEM_KINDS as readonly string[]).includes(value);
}
