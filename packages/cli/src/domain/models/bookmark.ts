/** Number of tag slots every bookmark row carries. */
export const ROW_TAG_CAPACITY = 8;

export const TITLE_MAX_LENGTH = 63;
export const COMMENT_MAX_LENGTH = 255;

/**
 * One slot of a row's tag array. `null` marks a free slot; in the persisted
 * document it is written as `"0"`.
 */
export type TagSlot = number | null;

export interface Bookmark {
  id: number;
  url: string;
  title: string;
  comment: string;
  /** Always exactly {@link ROW_TAG_CAPACITY} entries long. */
  tagSlots: TagSlot[];
  /** Canonical `YYYY-MM-DD HH:MM:SS` local time of the last mutation. */
  lastUpdated: string;
}

export function emptyTagSlots(): TagSlot[] {
  return Array.from({ length: ROW_TAG_CAPACITY }, () => null);
}
