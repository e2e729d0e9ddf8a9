/**
 * Row layout inside the persisted document:
 * `[url, title, comment, lastUpdated, tagIds]`.
 * Field order is positional and part of the file format.
 */
export type StoredRow = [
  url: string,
  title: string,
  comment: string,
  lastUpdated: string,
  tagIds: string[]
];

export interface StoreDocument {
  tags: Record<string, string>;
  rows: Record<string, StoredRow>;
}

export const STORE_DOCUMENT_KEYS = ["tags", "rows"] as const;
