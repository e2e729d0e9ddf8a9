/**
 * A single parsed command. Every invocation of the CLI resolves to exactly one
 * of these and performs exactly one state transition.
 */
export type Operation =
  | AddBookmarkOperation
  | UpdateBookmarkOperation
  | RemoveBookmarkOperation
  | OpenBookmarkOperation
  | ListBookmarksOperation
  | ListBookmarksByTagOperation
  | AddTagOperation
  | RenameTagOperation
  | RemoveTagOperation
  | ListTagsOperation
  | AddTagToEntryOperation;

export type OperationKind = Operation["kind"];

export interface AddBookmarkOperation {
  kind: "add-bookmark";
  url: string;
  title?: string;
  comment?: string;
  /** Space separated tag ids and/or names. */
  tags?: string;
}

export interface UpdateBookmarkOperation {
  kind: "update-bookmark";
  id: number;
  title?: string;
  comment?: string;
  /** Space separated tag ids and/or names, each one toggled on the row. */
  tags?: string;
}

export interface RemoveBookmarkOperation {
  kind: "remove-bookmark";
  id: number;
}

export interface OpenBookmarkOperation {
  kind: "open-bookmark";
  id: number;
}

export type BookmarkFilter = { type: "all" } | { type: "title"; term: string };

export interface ListBookmarksOperation {
  kind: "list-bookmarks";
  filter: BookmarkFilter;
}

export interface ListBookmarksByTagOperation {
  kind: "list-bookmarks-by-tag";
  tags: string;
}

export interface AddTagOperation {
  kind: "add-tag";
  name: string;
}

export interface RenameTagOperation {
  kind: "rename-tag";
  target: string;
  name: string;
}

export interface RemoveTagOperation {
  kind: "remove-tag";
  target: string;
}

export interface ListTagsOperation {
  kind: "list-tags";
  scope: string;
}

export interface AddTagToEntryOperation {
  kind: "add-tag-to-entry";
  rowId: number;
  tag: string;
}
