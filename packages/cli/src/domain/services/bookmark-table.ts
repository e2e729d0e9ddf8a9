import {
  COMMENT_MAX_LENGTH,
  ROW_TAG_CAPACITY,
  TITLE_MAX_LENGTH,
  emptyTagSlots,
  type Bookmark,
  type TagSlot
} from "../models/bookmark";
import { CapacityExceededError } from "../models/errors";
import { truncateWithEllipsis } from "./text";

export interface NewBookmark {
  url: string;
  title: string;
  comment: string;
  tagIds: number[];
  lastUpdated: string;
}

/**
 * Bookmark rows keyed by id, in insertion order. Deleted ids are dropped from
 * the map but `nextId` never moves backwards, so an id is never handed out
 * twice.
 */
export class BookmarkTable {
  private readonly rows = new Map<number, Bookmark>();
  private next = 1;

  public get nextId(): number {
    return this.next;
  }

  public get size(): number {
    return this.rows.size;
  }

  public add(input: NewBookmark): Bookmark {
    if (input.tagIds.length > ROW_TAG_CAPACITY) {
      throw new RangeError(`A bookmark holds at most ${ROW_TAG_CAPACITY} tags`);
    }

    if (!Number.isSafeInteger(this.next)) {
      throw new CapacityExceededError("No bookmark ids are left to allocate");
    }

    const tagSlots = emptyTagSlots();
    input.tagIds.forEach((tagId, index) => {
      tagSlots[index] = tagId;
    });

    const row: Bookmark = {
      id: this.next,
      url: input.url,
      title: truncateWithEllipsis(input.title, TITLE_MAX_LENGTH),
      comment: truncateWithEllipsis(input.comment, COMMENT_MAX_LENGTH),
      tagSlots,
      lastUpdated: input.lastUpdated
    };

    this.rows.set(row.id, row);
    this.next += 1;
    return row;
  }

  /**
   * Inserts a row under an id that already exists in the persisted store.
   * Used while decoding; advances `nextId` past the restored id.
   */
  public restore(row: Bookmark): void {
    if (this.rows.has(row.id)) {
      throw new RangeError(`Duplicate bookmark id ${row.id}`);
    }

    this.rows.set(row.id, { ...row, tagSlots: normalizeSlots(row.tagSlots) });
    this.next = Math.max(this.next, row.id + 1);
  }

  public get(id: number): Bookmark | undefined {
    return this.rows.get(id);
  }

  public has(id: number): boolean {
    return this.rows.has(id);
  }

  /** Replaces the stored row with the same id. */
  public replace(row: Bookmark): void {
    if (!this.rows.has(row.id)) {
      throw new RangeError(`Unknown bookmark id ${row.id}`);
    }

    this.rows.set(row.id, row);
  }

  public remove(id: number): boolean {
    return this.rows.delete(id);
  }

  public values(): IterableIterator<Bookmark> {
    return this.rows.values();
  }

  public [Symbol.iterator](): IterableIterator<Bookmark> {
    return this.rows.values();
  }
}

function normalizeSlots(slots: TagSlot[]): TagSlot[] {
  const normalized = emptyTagSlots();
  slots.slice(0, ROW_TAG_CAPACITY).forEach((slot, index) => {
    normalized[index] = slot === 0 ? null : slot;
  });
  return normalized;
}

export function rowHasTag(row: Bookmark, tagId: number): boolean {
  return row.tagSlots.includes(tagId);
}

export function firstFreeSlot(row: Bookmark): number {
  return row.tagSlots.indexOf(null);
}

export function rowTagIds(row: Bookmark): number[] {
  return row.tagSlots.filter((slot): slot is number => slot !== null);
}
