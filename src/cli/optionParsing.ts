import type { ListFilesOptions, ListOptions } from "@services/DirManager";
import { IMAGE_EXTENSIONS } from "@domain/ExtensionSets";
import type { FilesOptions, ListingOptions } from "./options";

export const splitCommaSeparated = (value: string | undefined): string[] =>
  value
    ? value
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s.length > 0)
    : [];

/** ".py", "py" and "*.py" all mean the ".py" suffix. */
export const normalizeExtension = (value: string): string => {
  const bare = value.replace(/^\*?\.?/, "");
  return `.${bare}`;
};

export const parseExtensions = (value: string | undefined): string[] =>
  splitCommaSeparated(value).map(normalizeExtension);

export const toListOptions = (options: ListingOptions): ListOptions => ({
  maxDepth: options.maxDepth,
  sortBy: options.sort,
  reverse: options.reverse,
  relative: options.relative
});

export const toListFilesOptions = (options: FilesOptions): ListFilesOptions => ({
  ...toListOptions(options),
  extensions: [...(options.images ? IMAGE_EXTENSIONS : []), ...parseExtensions(options.ext)]
});
