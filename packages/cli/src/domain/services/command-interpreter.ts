import {
  COMMENT_MAX_LENGTH,
  ROW_TAG_CAPACITY,
  TITLE_MAX_LENGTH,
  type Bookmark
} from "../models/bookmark";
import {
  AlreadyTaggedError,
  CapacityExceededError,
  NotFoundError,
  OpenFailedError,
  ValidationError
} from "../models/errors";
import type {
  AddBookmarkOperation,
  AddTagOperation,
  AddTagToEntryOperation,
  ListBookmarksByTagOperation,
  ListBookmarksOperation,
  ListTagsOperation,
  Operation,
  RemoveTagOperation,
  RenameTagOperation,
  UpdateBookmarkOperation
} from "../models/operation";
import type { Tag } from "../models/tag";
import { firstFreeSlot, rowHasTag } from "./bookmark-table";
import {
  listBookmarks,
  listBookmarksByTag,
  listTags,
  renderBookmark,
  renderTag
} from "./listing";
import type { BookmarkStore } from "./store-codec";
import { normalizeTagName } from "./tag-registry";
import { equalsIgnoreCase, splitWords, truncateWithEllipsis } from "./text";
import { formatTimestamp } from "./timestamp";

/**
 * Everything a command needs from outside the store. The CLI wires these to
 * the network, the platform URL handler and stdin; tests pass stand-ins.
 */
export interface CommandEnvironment {
  now: () => Date;
  print: (line: string) => void;
  confirm: (question: string) => Promise<boolean>;
  fetchTitle: (url: string) => Promise<string>;
  openUrl: (url: string) => Promise<boolean>;
}

export type CommandStatus = "changed" | "unchanged" | "aborted";

export interface CommandOutcome {
  status: CommandStatus;
}

const CHANGED: CommandOutcome = { status: "changed" };
const UNCHANGED: CommandOutcome = { status: "unchanged" };
const ABORTED: CommandOutcome = { status: "aborted" };

function requireRow(store: BookmarkStore, id: number): Bookmark {
  const row = store.table.get(id);
  if (!row) {
    throw new NotFoundError(`Bookmark ${id} could not be found`);
  }
  return row;
}

function requireTagTokens(tagList: string): string[] {
  const tokens = splitWords(tagList);
  if (tokens.length === 0) {
    throw new ValidationError("-tg needs at least one tag id or name");
  }
  return tokens;
}

/**
 * Resolves the tag list of an `add`. Unknown and repeated tags are skipped
 * with a warning; more tags than a row can hold is an error.
 */
function resolveTagsForNewRow(store: BookmarkStore, tagList: string): number[] {
  const tagIds: number[] = [];

  for (const token of requireTagTokens(tagList)) {
    let tag: Tag;
    try {
      tag = store.tags.resolve(token);
    } catch (error) {
      if (error instanceof NotFoundError) {
        console.warn(`Skipping tag '${token}': ${error.message}`);
        continue;
      }
      throw error;
    }

    if (tagIds.includes(tag.id)) {
      console.warn(`Skipping tag '${token}': already listed`);
      continue;
    }

    tagIds.push(tag.id);
  }

  if (tagIds.length > ROW_TAG_CAPACITY) {
    throw new ValidationError(
      `A bookmark holds at most ${ROW_TAG_CAPACITY} tags, ${tagIds.length} were given`
    );
  }

  return tagIds;
}

async function fetchTitleOrEmpty(env: CommandEnvironment, url: string): Promise<string> {
  try {
    return await env.fetchTitle(url);
  } catch (error) {
    console.warn(`Could not read a title from ${url}; leaving it empty`, error);
    return "";
  }
}

async function addBookmark(
  store: BookmarkStore,
  operation: AddBookmarkOperation,
  env: CommandEnvironment
): Promise<CommandOutcome> {
  const url = operation.url.trim();
  if (url.length === 0) {
    throw new ValidationError("Attempting to add a bookmark but no URL was provided");
  }

  const tagIds = operation.tags === undefined ? [] : resolveTagsForNewRow(store, operation.tags);
  const title = operation.title ?? (await fetchTitleOrEmpty(env, url));

  const row = store.table.add({
    url,
    title,
    comment: operation.comment ?? "",
    tagIds,
    lastUpdated: formatTimestamp(env.now())
  });

  env.print(`Added bookmark ${row.id}`);
  return CHANGED;
}

/**
 * Applies the update to a copy of the row and only stores it once every
 * tag has resolved and every removal has been confirmed.
 */
async function updateBookmark(
  store: BookmarkStore,
  operation: UpdateBookmarkOperation,
  env: CommandEnvironment
): Promise<CommandOutcome> {
  if (operation.title === undefined && operation.comment === undefined && operation.tags === undefined) {
    throw new ValidationError("'update' needs at least one of -c, -t or -tg");
  }

  const row = requireRow(store, operation.id);
  const draft: Bookmark = { ...row, tagSlots: [...row.tagSlots] };

  if (operation.title !== undefined) {
    draft.title = truncateWithEllipsis(operation.title, TITLE_MAX_LENGTH);
  }

  if (operation.comment !== undefined) {
    draft.comment = truncateWithEllipsis(operation.comment, COMMENT_MAX_LENGTH);
  }

  if (operation.tags !== undefined) {
    for (const token of requireTagTokens(operation.tags)) {
      const tag = store.tags.resolve(token);
      const existing = draft.tagSlots.indexOf(tag.id);

      if (existing >= 0) {
        const confirmed = await env.confirm(
          `Are you sure you want to remove tag '${tag.name}' from bookmark ${row.id}?`
        );
        if (!confirmed) {
          return ABORTED;
        }
        draft.tagSlots[existing] = null;
        continue;
      }

      const free = firstFreeSlot(draft);
      if (free < 0) {
        throw new CapacityExceededError(
          `Bookmark ${row.id} already holds ${ROW_TAG_CAPACITY} tags`
        );
      }
      draft.tagSlots[free] = tag.id;
    }
  }

  draft.lastUpdated = formatTimestamp(env.now());
  store.table.replace(draft);
  return CHANGED;
}

async function removeBookmark(
  store: BookmarkStore,
  id: number,
  env: CommandEnvironment
): Promise<CommandOutcome> {
  const row = requireRow(store, id);

  const confirmed = await env.confirm(
    `Are you sure you want to delete bookmark ${row.id} entitled '${row.title}'?`
  );
  if (!confirmed) {
    return ABORTED;
  }

  store.table.remove(row.id);
  return CHANGED;
}

async function openBookmark(
  store: BookmarkStore,
  id: number,
  env: CommandEnvironment
): Promise<CommandOutcome> {
  const row = requireRow(store, id);

  if (!(await env.openUrl(row.url))) {
    throw new OpenFailedError(`Could not open ${row.url}`);
  }

  return UNCHANGED;
}

function printRows(store: BookmarkStore, rows: Iterable<Bookmark>, env: CommandEnvironment): void {
  for (const row of rows) {
    for (const line of renderBookmark(row, store)) {
      env.print(line);
    }
  }
}

function showBookmarks(
  store: BookmarkStore,
  operation: ListBookmarksOperation,
  env: CommandEnvironment
): CommandOutcome {
  printRows(store, listBookmarks(store, operation.filter), env);
  return UNCHANGED;
}

function showBookmarksByTag(
  store: BookmarkStore,
  operation: ListBookmarksByTagOperation,
  env: CommandEnvironment
): CommandOutcome {
  const tagIds = requireTagTokens(operation.tags).map((token) => store.tags.resolve(token).id);
  printRows(store, listBookmarksByTag(store, tagIds), env);
  return UNCHANGED;
}

function addTag(
  store: BookmarkStore,
  operation: AddTagOperation,
  env: CommandEnvironment
): CommandOutcome {
  const tag = store.tags.add(normalizeTagName(operation.name));
  env.print(`Added tag ${renderTag(tag)}`);
  return CHANGED;
}

function renameTag(store: BookmarkStore, operation: RenameTagOperation): CommandOutcome {
  const tag = store.tags.resolve(operation.target);
  store.tags.rename(tag.id, normalizeTagName(operation.name));
  return CHANGED;
}

/** Deletes the tag and clears it from every row that carries it. */
async function removeTag(
  store: BookmarkStore,
  operation: RemoveTagOperation,
  env: CommandEnvironment
): Promise<CommandOutcome> {
  const tag = store.tags.resolve(operation.target);

  const confirmed = await env.confirm(`Are you sure you want to remove tag '${tag.name}'?`);
  if (!confirmed) {
    return ABORTED;
  }

  const lastUpdated = formatTimestamp(env.now());

  for (const row of [...store.table]) {
    if (!rowHasTag(row, tag.id)) {
      continue;
    }

    store.table.replace({
      ...row,
      tagSlots: row.tagSlots.map((slot) => (slot === tag.id ? null : slot)),
      lastUpdated
    });
  }

  store.tags.remove(tag.id);
  return CHANGED;
}

function showTags(
  store: BookmarkStore,
  operation: ListTagsOperation,
  env: CommandEnvironment
): CommandOutcome {
  if (!equalsIgnoreCase(operation.scope, "all")) {
    throw new ValidationError('Only "all" can be used to list tags');
  }

  for (const tag of listTags(store)) {
    env.print(renderTag(tag));
  }

  return UNCHANGED;
}

function addTagToEntry(
  store: BookmarkStore,
  operation: AddTagToEntryOperation,
  env: CommandEnvironment
): CommandOutcome {
  const tag = store.tags.resolve(operation.tag);
  const row = requireRow(store, operation.rowId);

  if (rowHasTag(row, tag.id)) {
    throw new AlreadyTaggedError(`Bookmark ${row.id} is already tagged with '${tag.name}'`);
  }

  const free = firstFreeSlot(row);
  if (free < 0) {
    throw new CapacityExceededError(`Bookmark ${row.id} already holds ${ROW_TAG_CAPACITY} tags`);
  }

  const tagSlots = [...row.tagSlots];
  tagSlots[free] = tag.id;
  store.table.replace({ ...row, tagSlots, lastUpdated: formatTimestamp(env.now()) });
  return CHANGED;
}

/**
 * Performs one operation against the store. Lookup and validation failures
 * throw before anything is mutated; a declined confirmation resolves to an
 * `aborted` outcome with the store untouched.
 */
export async function executeOperation(
  operation: Operation,
  store: BookmarkStore,
  env: CommandEnvironment
): Promise<CommandOutcome> {
  switch (operation.kind) {
    case "add-bookmark":
      return addBookmark(store, operation, env);
    case "update-bookmark":
      return updateBookmark(store, operation, env);
    case "remove-bookmark":
      return removeBookmark(store, operation.id, env);
    case "open-bookmark":
      return openBookmark(store, operation.id, env);
    case "list-bookmarks":
      return showBookmarks(store, operation, env);
    case "list-bookmarks-by-tag":
      return showBookmarksByTag(store, operation, env);
    case "add-tag":
      return addTag(store, operation, env);
    case "rename-tag":
      return renameTag(store, operation);
    case "remove-tag":
      return removeTag(store, operation, env);
    case "list-tags":
      return showTags(store, operation, env);
    case "add-tag-to-entry":
      return addTagToEntry(store, operation, env);
  }
}
