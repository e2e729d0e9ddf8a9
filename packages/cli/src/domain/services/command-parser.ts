import { ValidationError } from "../models/errors";
import type { Operation } from "../models/operation";
import { equalsIgnoreCase, isDecimalDigits } from "./text";

export const MAX_BOOKMARK_ARGUMENTS = 8;
export const MAX_TAG_ARGUMENTS = 2;

const BOOKMARK_VERBS = ["add", "update", "remove", "open", "list"] as const;
const TAG_VERBS = ["add", "rename", "remove", "list"] as const;

type BookmarkVerb = (typeof BOOKMARK_VERBS)[number];
type TagVerb = (typeof TAG_VERBS)[number];

const OPTION_FLAGS = {
  "-c": "comment",
  "-t": "title",
  "-tg": "tags"
} as const;

type OptionFlag = keyof typeof OPTION_FLAGS;
type OptionField = (typeof OPTION_FLAGS)[OptionFlag];
type ParsedOptions = Partial<Record<OptionField, string>>;

function isBookmarkVerb(value: string): value is BookmarkVerb {
  return (BOOKMARK_VERBS as readonly string[]).includes(value);
}

function isTagVerb(value: string): value is TagVerb {
  return (TAG_VERBS as readonly string[]).includes(value);
}

function isOptionFlag(value: string): value is OptionFlag {
  return Object.prototype.hasOwnProperty.call(OPTION_FLAGS, value);
}

export function parseRecordId(token: string, label: string): number {
  if (!isDecimalDigits(token) || Number(token) < 1 || !Number.isSafeInteger(Number(token))) {
    throw new ValidationError(`${label} must be a numeric id, got '${token}'`);
  }

  return Number(token);
}

/** Reads `-c/-t/-tg <value>` pairs; every flag consumes exactly the next token. */
function parseOptions(tokens: readonly string[]): ParsedOptions {
  const options: ParsedOptions = {};

  for (let index = 0; index < tokens.length; index += 2) {
    const token = tokens[index];

    if (!isOptionFlag(token)) {
      throw new ValidationError(`Unexpected argument '${token}'`);
    }

    const value = tokens[index + 1];
    if (value === undefined) {
      throw new ValidationError(`Option ${token} was given without a value`);
    }

    const field = OPTION_FLAGS[token];
    if (options[field] !== undefined) {
      throw new ValidationError(`Option ${token} was given more than once`);
    }

    options[field] = value;
  }

  return options;
}

function parseBookmarkCommand(verb: BookmarkVerb, args: readonly string[]): Operation {
  if (args.length < 1) {
    throw new ValidationError(`'${verb}' needs at least one argument`);
  }

  if (args.length > MAX_BOOKMARK_ARGUMENTS) {
    throw new ValidationError(
      `Too many arguments for '${verb}'. Perhaps a list was not enclosed in quotes.`
    );
  }

  switch (verb) {
    case "add": {
      const [url, ...rest] = args;
      if (url.startsWith("-")) {
        throw new ValidationError("Attempting to add a bookmark but no URL was provided");
      }
      return { kind: "add-bookmark", url, ...parseOptions(rest) };
    }

    case "update": {
      const [idToken, ...rest] = args;
      const id = parseRecordId(idToken, "Bookmark");
      if (rest.length === 0) {
        throw new ValidationError("'update' needs at least one of -c, -t or -tg");
      }
      return { kind: "update-bookmark", id, ...parseOptions(rest) };
    }

    case "remove":
    case "open": {
      if (args.length !== 1) {
        throw new ValidationError(`'${verb}' takes exactly one bookmark id`);
      }
      const id = parseRecordId(args[0], "Bookmark");
      return verb === "remove"
        ? { kind: "remove-bookmark", id }
        : { kind: "open-bookmark", id };
    }

    case "list": {
      if (args.length === 1 && args[0] !== "-tg") {
        return equalsIgnoreCase(args[0], "all")
          ? { kind: "list-bookmarks", filter: { type: "all" } }
          : { kind: "list-bookmarks", filter: { type: "title", term: args[0] } };
      }

      if (args.length === 2 && args[0] === "-tg") {
        return { kind: "list-bookmarks-by-tag", tags: args[1] };
      }

      throw new ValidationError("Usage: list <term|all> | list -tg <tag-id|tag-name ...>");
    }
  }
}

function parseTagCommand(args: readonly string[]): Operation {
  if (args.length === 0) {
    throw new ValidationError("Too few arguments for interacting with tags");
  }

  const [head, ...params] = args;

  if (!isTagVerb(head)) {
    if (args.length !== 2) {
      throw new ValidationError("Usage: tag <bookmark-id> <tag-id|tag-name>");
    }
    return {
      kind: "add-tag-to-entry",
      rowId: parseRecordId(head, "Bookmark"),
      tag: params[0]
    };
  }

  if (params.length < 1) {
    throw new ValidationError(`Too few arguments for 'tag ${head}'`);
  }

  if (params.length > MAX_TAG_ARGUMENTS) {
    throw new ValidationError(
      `Too many arguments for 'tag ${head}'. Perhaps a value was not enclosed in quotes.`
    );
  }

  const expected = head === "rename" ? 2 : 1;
  if (params.length !== expected) {
    throw new ValidationError(
      `'tag ${head}' takes exactly ${expected} argument${expected === 1 ? "" : "s"}`
    );
  }

  switch (head) {
    case "add":
      return { kind: "add-tag", name: params[0] };
    case "rename":
      return { kind: "rename-tag", target: params[0], name: params[1] };
    case "remove":
      return { kind: "remove-tag", target: params[0] };
    case "list":
      return { kind: "list-tags", scope: params[0] };
  }
}

/**
 * Turns raw command-line tokens (without the program name) into an
 * {@link Operation}. Pure: performs no lookups against the store.
 */
export function parseCommand(argv: readonly string[]): Operation {
  if (argv.length === 0) {
    throw new ValidationError("No arguments provided");
  }

  const [verb, ...args] = argv;

  if (verb === "tag") {
    return parseTagCommand(args);
  }

  if (isBookmarkVerb(verb)) {
    return parseBookmarkCommand(verb, args);
  }

  throw new ValidationError(`Unknown command '${verb}'`);
}
