export const TAG_NAME_MAX_LENGTH = 31;

export const RESERVED_TAG_NAMES = ["add", "update", "rename", "remove"] as const;

export interface Tag {
  id: number;
  name: string;
}
