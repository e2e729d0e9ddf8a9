import {
  COMMENT_MAX_LENGTH,
  ROW_TAG_CAPACITY,
  TITLE_MAX_LENGTH,
  emptyTagSlots,
  type Bookmark,
  type TagSlot
} from "../models/bookmark";
import { TAG_NAME_MAX_LENGTH } from "../models/tag";
import { DecodeError } from "../models/errors";
import {
  STORE_DOCUMENT_KEYS,
  type StoreDocument,
  type StoredRow
} from "../models/store-document";
import { BookmarkTable } from "./bookmark-table";
import { TagRegistry } from "./tag-registry";
import { truncateWithEllipsis } from "./text";
import { isCanonicalTimestamp } from "./timestamp";

export interface BookmarkStore {
  tags: TagRegistry;
  table: BookmarkTable;
}

export function createEmptyStore(): BookmarkStore {
  return { tags: new TagRegistry(), table: new BookmarkTable() };
}

const STORED_ROW_LENGTH = 5;
const RECORD_ID_PATTERN = /^[1-9][0-9]*$/;
const TAG_ID_PATTERN = /^(0|[1-9][0-9]*)$/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseRecordId(key: string, collection: string): number {
  if (!RECORD_ID_PATTERN.test(key)) {
    throw new DecodeError(`'${collection}' key '${key}' is not a positive decimal id`);
  }

  const id = Number(key);
  if (!Number.isSafeInteger(id)) {
    throw new DecodeError(`'${collection}' key '${key}' is too large to be an id`);
  }

  return id;
}

function expectString(value: unknown, field: string, rowId: number): string {
  if (typeof value !== "string") {
    throw new DecodeError(`Row ${rowId}: ${field} must be a string`);
  }

  return value;
}

function decodeTagSlots(value: unknown, rowId: number): TagSlot[] {
  if (!Array.isArray(value)) {
    throw new DecodeError(`Row ${rowId}: tag ids must be an array`);
  }

  const entries: unknown[] = value;

  if (entries.length > ROW_TAG_CAPACITY) {
    throw new DecodeError(
      `Row ${rowId}: holds ${entries.length} tag slots, at most ${ROW_TAG_CAPACITY} are allowed`
    );
  }

  const slots = emptyTagSlots();
  const seen = new Set<number>();

  entries.forEach((entry, index) => {
    if (typeof entry !== "string" || !TAG_ID_PATTERN.test(entry)) {
      throw new DecodeError(`Row ${rowId}: tag slot ${index} is not a decimal id string`);
    }

    const tagId = Number(entry);
    if (!Number.isSafeInteger(tagId)) {
      throw new DecodeError(`Row ${rowId}: tag slot ${index} holds '${entry}', too large to be an id`);
    }

    if (tagId === 0) {
      return;
    }

    if (seen.has(tagId)) {
      throw new DecodeError(`Row ${rowId}: tag ${tagId} appears more than once`);
    }

    seen.add(tagId);
    slots[index] = tagId;
  });

  return slots;
}

function decodeRow(id: number, value: unknown): Bookmark {
  if (!Array.isArray(value) || value.length !== STORED_ROW_LENGTH) {
    throw new DecodeError(`Row ${id}: expected an array of ${STORED_ROW_LENGTH} fields`);
  }

  const fields: unknown[] = value;
  const [rawUrl, rawTitle, rawComment, rawTimestamp, rawTagIds] = fields;

  const lastUpdated = expectString(rawTimestamp, "last updated", id);
  if (!isCanonicalTimestamp(lastUpdated)) {
    throw new DecodeError(
      `Row ${id}: '${lastUpdated}' is not a YYYY-MM-DD HH:MM:SS timestamp`
    );
  }

  return {
    id,
    url: expectString(rawUrl, "url", id),
    title: truncateWithEllipsis(expectString(rawTitle, "title", id), TITLE_MAX_LENGTH),
    comment: truncateWithEllipsis(
      expectString(rawComment, "comment", id),
      COMMENT_MAX_LENGTH
    ),
    tagSlots: decodeTagSlots(rawTagIds, id),
    lastUpdated
  };
}

/**
 * Builds the in-memory store from a parsed document. The document must hold
 * exactly `tags` followed by `rows`; both `nextId` counters end up one past
 * the largest id seen.
 */
export function decodeStore(document: unknown): BookmarkStore {
  if (!isPlainObject(document)) {
    throw new DecodeError("Store document must be a JSON object");
  }

  const keys = Object.keys(document);
  if (
    keys.length !== STORE_DOCUMENT_KEYS.length ||
    keys.some((key, index) => key !== STORE_DOCUMENT_KEYS[index])
  ) {
    throw new DecodeError(
      `Store document must contain exactly "tags" then "rows", found ${JSON.stringify(keys)}`
    );
  }

  const { tags: rawTags, rows: rawRows } = document;
  if (!isPlainObject(rawTags)) {
    throw new DecodeError(`"tags" must be an object`);
  }
  if (!isPlainObject(rawRows)) {
    throw new DecodeError(`"rows" must be an object`);
  }

  const store = createEmptyStore();

  for (const [key, name] of Object.entries(rawTags)) {
    const id = parseRecordId(key, "tags");
    if (typeof name !== "string") {
      throw new DecodeError(`Tag ${id}: name must be a string`);
    }
    store.tags.restore({ id, name: truncateWithEllipsis(name, TAG_NAME_MAX_LENGTH) });
  }

  for (const [key, value] of Object.entries(rawRows)) {
    const id = parseRecordId(key, "rows");
    store.table.restore(decodeRow(id, value));
  }

  return store;
}

export function decodeStoreText(text: string): BookmarkStore {
  let document: unknown;

  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new DecodeError("Store file is not valid JSON", { cause: error });
  }

  return decodeStore(document);
}

function encodeRow(row: Bookmark): StoredRow {
  const tagIds = Array.from({ length: ROW_TAG_CAPACITY }, (_, index) =>
    String(row.tagSlots[index] ?? 0)
  );

  return [row.url, row.title, row.comment, row.lastUpdated, tagIds];
}

/** Inverse of {@link decodeStore}; deleted records are simply absent. */
export function encodeStore(store: BookmarkStore): StoreDocument {
  const tags: Record<string, string> = {};
  for (const tag of store.tags) {
    tags[String(tag.id)] = tag.name;
  }

  const rows: Record<string, StoredRow> = {};
  for (const row of store.table) {
    rows[String(row.id)] = encodeRow(row);
  }

  return { tags, rows };
}

export function serializeStore(store: BookmarkStore): string {
  return `${JSON.stringify(encodeStore(store), null, "\t")}\n`;
}
