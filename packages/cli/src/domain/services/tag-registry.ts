import { RESERVED_TAG_NAMES, TAG_NAME_MAX_LENGTH, type Tag } from "../models/tag";
import { CapacityExceededError, NotFoundError, ValidationError } from "../models/errors";
import { equalsIgnoreCase, isDecimalDigits, truncateWithEllipsis } from "./text";

/**
 * Checks a user supplied tag name and returns the form that gets stored:
 * internal spaces become hyphens and over-long names are truncated.
 */
export function normalizeTagName(raw: string): string {
  const trimmed = raw.trim();

  if (trimmed.length === 0) {
    throw new ValidationError("Tag names cannot be empty");
  }

  if (/^[0-9]/.test(trimmed)) {
    throw new ValidationError(
      `Invalid tag name '${trimmed}': tag names cannot start with a number`
    );
  }

  if (RESERVED_TAG_NAMES.some((reserved) => equalsIgnoreCase(reserved, trimmed))) {
    throw new ValidationError(
      `Invalid tag name '${trimmed}': ${RESERVED_TAG_NAMES.join(", ")} are reserved`
    );
  }

  return truncateWithEllipsis(trimmed.replace(/ /g, "-"), TAG_NAME_MAX_LENGTH);
}

export class TagRegistry {
  private readonly tags = new Map<number, Tag>();
  private next = 1;

  public get nextId(): number {
    return this.next;
  }

  public get size(): number {
    return this.tags.size;
  }

  /** Adds a tag whose name has already been through {@link normalizeTagName}. */
  public add(name: string): Tag {
    if (!Number.isSafeInteger(this.next)) {
      throw new CapacityExceededError("No tag ids are left to allocate");
    }

    const tag: Tag = { id: this.next, name };
    this.tags.set(tag.id, tag);
    this.next += 1;
    return tag;
  }

  public restore(tag: Tag): void {
    if (this.tags.has(tag.id)) {
      throw new RangeError(`Duplicate tag id ${tag.id}`);
    }

    this.tags.set(tag.id, { ...tag });
    this.next = Math.max(this.next, tag.id + 1);
  }

  public get(id: number): Tag | undefined {
    return this.tags.get(id);
  }

  public rename(id: number, name: string): Tag {
    const existing = this.tags.get(id);
    if (!existing) {
      throw new NotFoundError(`Tag ${id} could not be found`);
    }

    const renamed = { ...existing, name };
    this.tags.set(id, renamed);
    return renamed;
  }

  public remove(id: number): boolean {
    return this.tags.delete(id);
  }

  /** First live tag whose name matches, ignoring case. */
  public findByName(name: string): Tag | undefined {
    for (const tag of this.tags.values()) {
      if (equalsIgnoreCase(tag.name, name)) {
        return tag;
      }
    }

    return undefined;
  }

  /**
   * Resolves a command token to a live tag. All-digit tokens are ids,
   * anything else is matched by name.
   */
  public resolve(token: string): Tag {
    const trimmed = token.trim();

    if (isDecimalDigits(trimmed)) {
      const tag = this.tags.get(Number(trimmed));
      if (!tag) {
        throw new NotFoundError(`Tag ${trimmed} could not be found`);
      }
      return tag;
    }

    const tag = this.findByName(trimmed.replace(/ /g, "-"));
    if (!tag) {
      throw new NotFoundError(`Could not find tag '${trimmed}'`);
    }
    return tag;
  }

  public values(): IterableIterator<Tag> {
    return this.tags.values();
  }

  public [Symbol.iterator](): IterableIterator<Tag> {
    return this.tags.values();
  }
}
