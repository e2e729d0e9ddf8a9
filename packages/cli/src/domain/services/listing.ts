import type { Bookmark } from "../models/bookmark";
import type { BookmarkFilter } from "../models/operation";
import type { Tag } from "../models/tag";
import type { BookmarkStore } from "./store-codec";
import { rowHasTag, rowTagIds } from "./bookmark-table";
import { containsIgnoreCase } from "./text";

/**
 * Rows matching `filter` in table order. The returned iterable re-reads the
 * table every time it is iterated.
 */
export function listBookmarks(store: BookmarkStore, filter: BookmarkFilter): Iterable<Bookmark> {
  return {
    *[Symbol.iterator]() {
      for (const row of store.table) {
        if (filter.type === "all" || containsIgnoreCase(row.title, filter.term)) {
          yield row;
        }
      }
    }
  };
}

/**
 * Rows holding any of `tagIds`. A row is yielded once for every requested
 * tag it carries, so a row matching two requested tags appears twice in a
 * row.
 */
export function listBookmarksByTag(
  store: BookmarkStore,
  tagIds: readonly number[]
): Iterable<Bookmark> {
  return {
    *[Symbol.iterator]() {
      for (const row of store.table) {
        for (const tagId of tagIds) {
          if (rowHasTag(row, tagId)) {
            yield row;
          }
        }
      }
    }
  };
}

export function listTags(store: BookmarkStore): Iterable<Tag> {
  return {
    [Symbol.iterator]: () => store.tags.values()
  };
}

/** Tag names for a row's occupied slots; tags deleted since render as `#<id>`. */
export function resolveTagNames(row: Bookmark, store: BookmarkStore): string[] {
  return rowTagIds(row).map((tagId) => store.tags.get(tagId)?.name ?? `#${tagId}`);
}

export function renderBookmark(row: Bookmark, store: BookmarkStore): string[] {
  const lines = [`${String(row.id).padStart(3, " ")}. ${row.title}`, `\t > ${row.url}`];

  if (row.comment.length > 0) {
    lines.push(`\t - ${row.comment}`);
  }

  const tagNames = resolveTagNames(row, store);
  if (tagNames.length > 0) {
    lines.push(`\t |${tagNames.map((name) => ` ${name} |`).join("")}`);
  }

  return lines;
}

export function renderTag(tag: Tag): string {
  return `${tag.id}] ${tag.name}`;
}
