import { Args, Options } from "@effect/cli";
import type { SortBy } from "@services/DirManager";

export const path = Options.directory("path").pipe(
  Options.withDescription("Base directory to work in. Defaults to the current directory."),
  Options.optional
);

export const followSymlinks = Options.boolean("follow-symlinks").pipe(
  Options.withDescription("Follow symbolic links while collecting statistics"),
  Options.withDefault(false)
);

export const ext = Options.text("ext").pipe(
  Options.withDescription("File extensions to include (e.g., '.py,.ts')"),
  Options.optional
);

export const images = Options.boolean("images").pipe(
  Options.withDescription("Only list image files (.jpg, .png, ...)"),
  Options.withDefault(false)
);

export const maxDepth = Options.integer("max-depth").pipe(
  Options.withDescription("How many directory levels below the base to descend (0 = base only)"),
  Options.optional
);

export const sort = Options.choice("sort", ["none", "name", "mtime", "size"] as const).pipe(
  Options.withDescription("Sort key for the listing"),
  Options.withDefault("none")
);

export const reverse = Options.boolean("reverse").pipe(
  Options.withDescription("Sort in descending order"),
  Options.withDefault(false)
);

export const relative = Options.boolean("relative").pipe(
  Options.withDescription("Print paths relative to the base directory"),
  Options.withDefault(false)
);

export const algorithm = Options.text("algorithm").pipe(
  Options.withDescription("Hash algorithm (e.g., md5, sha1, sha256)"),
  Options.withDefault("md5")
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export const file = Args.file({ name: "file", exists: "yes" }).pipe(
  Args.withDescription("File to hash")
);

export interface StatsOptions {
  readonly path: string | undefined;
  readonly followSymlinks: boolean;
}

export interface ListingOptions {
  readonly path: string | undefined;
  readonly maxDepth: number | undefined;
  readonly sort: SortBy;
  readonly reverse: boolean;
  readonly relative: boolean;
}

export interface FilesOptions extends ListingOptions {
  readonly ext: string | undefined;
  readonly images: boolean;
}

export interface HashOptions {
  readonly file: string;
  readonly algorithm: string;
}
