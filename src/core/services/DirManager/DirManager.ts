/**
 * DirManager - filesystem operations scoped to one base directory.
 *
 * Relative path arguments resolve against `baseDir`; absolute paths pass
 * through untouched, so this is a convenience, not a sandbox. Two managers
 * with the same `baseDir` are equal and hash alike.
 */

import { Console, Data, Effect, Either, Equal, Hash, Option, pipe, Stream } from "effect";
import { basename, dirname, isAbsolute, join, relative, resolve } from "node:path";
import type { DirStats } from "@domain/DirStats";
import { DirectoryNotFound, FileNotFound } from "@domain/errors";
import { IMAGE_EXTENSIONS, hasExtension } from "@domain/ExtensionSets";
import {
  DirectoryAnalyzerTag,
  formatMinimalDirStatsReport,
  type CollectOptions,
  type DirectoryAnalyzer,
} from "../DirectoryAnalyzer";
import {
  FileSystemServiceTag,
  IsADirectory,
  NotADirectory,
  PathAlreadyExists,
  type FileInfo,
  type FileSystemService,
  type FsError,
} from "../FileSystemService";
import { GlobServiceTag, type GlobError, type GlobService } from "../GlobService";
import { collectTree, treeSize, type TreeEntry } from "./collectTree";
import { sortItems, type SortOptions } from "./sorting";

// =============================================================================
// Typed errors
// =============================================================================

export class BaseDirNotFound extends Data.TaggedError("BaseDirNotFound")<{
  readonly path: string;
}> {}

// =============================================================================
// Options
// =============================================================================

export interface RelativeOption {
  /** Return paths relative to `baseDir` instead of absolute ones. */
  readonly relative?: boolean;
}

export interface ScanOptions extends SortOptions, RelativeOption {}

export interface ListOptions extends SortOptions, RelativeOption {
  readonly maxDepth?: number;
}

export interface ListFilesOptions extends ListOptions {
  /** Case-insensitive suffixes such as ".py"; empty or absent means no filter. */
  readonly extensions?: ReadonlyArray<string>;
}

export interface TransferOptions {
  readonly createDirs?: boolean;
}

/**
 * One directory of a walk. By default `subdirectories` and `files` hold bare
 * names; with `relative` they hold paths relative to `baseDir` instead.
 */
export interface WalkEntry {
  readonly directory: string;
  readonly subdirectories: ReadonlyArray<string>;
  readonly files: ReadonlyArray<string>;
}

interface Services {
  readonly fs: FileSystemService;
  readonly glob: GlobService;
  readonly analyzer: DirectoryAnalyzer;
}

// =============================================================================
// DirManager
// =============================================================================

export class DirManager implements Equal.Equal {
  private constructor(
    readonly baseDir: string,
    private readonly services: Services
  ) {}

  /**
   * Bind a manager to `baseDir` (default: the working directory).
   */
  static make(
    baseDir?: string
  ): Effect.Effect<DirManager, BaseDirNotFound, FileSystemServiceTag | GlobServiceTag | DirectoryAnalyzerTag> {
    return Effect.gen(function* () {
      const fs = yield* FileSystemServiceTag;
      const glob = yield* GlobServiceTag;
      const analyzer = yield* DirectoryAnalyzerTag;

      const base = resolve(baseDir ?? process.cwd());
      if (!(yield* fs.exists(base))) {
        return yield* Effect.fail(new BaseDirNotFound({ path: base }));
      }

      return new DirManager(base, { fs, glob, analyzer });
    });
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof DirManager && that.baseDir === this.baseDir;
  }

  [Hash.symbol](): number {
    return Hash.string(this.baseDir);
  }

  toString(): string {
    return `DirManager(${this.baseDir})`;
  }

  // ===========================================================================
  // Path helpers
  // ===========================================================================

  resolvePath(path: string): string {
    return isAbsolute(path) ? path : resolve(this.baseDir, path);
  }

  private formatPath(path: string, asRelative: boolean): string {
    return asRelative ? relative(this.baseDir, path) || "." : path;
  }

  private statFile(path: string): Effect.Effect<FileInfo, FileNotFound | FsError> {
    return pipe(
      this.services.fs.stat(path),
      Effect.catchTag("PathNotFound", () => Effect.fail(new FileNotFound({ path }))),
      Effect.filterOrFail(
        (info) => info.type === "File",
        () => new IsADirectory({ path })
      )
    );
  }

  private statDirectory(path: string): Effect.Effect<FileInfo, DirectoryNotFound | FsError> {
    return pipe(
      this.services.fs.stat(path),
      Effect.catchTag("PathNotFound", () => Effect.fail(new DirectoryNotFound({ path }))),
      Effect.filterOrFail(
        (info) => info.type === "Directory",
        () => new NotADirectory({ path })
      )
    );
  }

  /** Copy/move target: into `destination` when it is an existing directory. */
  private targetFor(source: string, destination: string): Effect.Effect<string> {
    return pipe(
      Effect.option(this.services.fs.stat(destination)),
      Effect.map((info) =>
        Option.isSome(info) && info.value.type === "Directory" ? join(destination, basename(source)) : destination
      )
    );
  }

  private prepareTransfer(
    src: string,
    dst: string,
    options: TransferOptions
  ): Effect.Effect<{ readonly source: string; readonly target: string }, FileNotFound | FsError> {
    const fs = this.services.fs;
    const source = this.resolvePath(src);
    const destination = this.resolvePath(dst);

    return Effect.gen(this, function* () {
      yield* this.statFile(source);
      if (options.createDirs ?? true) {
        yield* fs.makeDirectory(dirname(destination), { recursive: true });
      }
      const target = yield* this.targetFor(source, destination);
      return { source, target };
    });
  }

  private sortEntries(entries: ReadonlyArray<TreeEntry>, options: ListOptions) {
    return sortItems(entries, options, {
      name: (entry) => entry.name,
      mtime: (entry) => Effect.succeed(entry.info.mtime.getTime()),
      size: (entry) => Effect.succeed(entry.info.size),
    });
  }

  // ===========================================================================
  // Directory operations
  // ===========================================================================

  /**
   * Create `path` and any missing parents. Returns the absolute path.
   */
  createDir(path: string, options: { readonly existOk?: boolean } = {}): Effect.Effect<string, FsError> {
    const fs = this.services.fs;
    const target = this.resolvePath(path);
    const create = pipe(fs.makeDirectory(target, { recursive: true }), Effect.as(target));

    if (options.existOk ?? true) return create;

    return pipe(
      fs.exists(target),
      Effect.flatMap((exists) => (exists ? Effect.fail(new PathAlreadyExists({ path: target })) : create))
    );
  }

  /**
   * Immediate entries of a directory (not recursive). A stat failure while
   * fetching sort keys fails the whole call.
   */
  scan(path = ".", options: ScanOptions = {}): Effect.Effect<ReadonlyArray<string>, FsError> {
    const fs = this.services.fs;
    const directory = this.resolvePath(path);

    return Effect.gen(this, function* () {
      const info = yield* Effect.option(fs.stat(directory));
      if (Option.isNone(info) || info.value.type !== "Directory") {
        return yield* Effect.fail(new NotADirectory({ path: directory }));
      }

      const names = yield* fs.readDirectory(directory);
      const sorted = yield* sortItems(
        names.map((name) => join(directory, name)),
        options,
        {
          name: (entry) => basename(entry),
          mtime: (entry) => Effect.map(fs.stat(entry), (stat) => stat.mtime.getTime()),
          size: (entry) =>
            pipe(
              fs.stat(entry),
              Effect.map((stat) => (stat.type === "File" ? stat.size : 0)),
              Effect.catchTag("PathNotFound", () => Effect.succeed(0))
            ),
        }
      );

      return sorted.map((entry) => this.formatPath(entry, options.relative ?? false));
    });
  }

  /**
   * Regular files under `baseDir`, recursively. Files directly in `baseDir`
   * are at depth 0; `maxDepth` bounds how many levels below it are entered.
   */
  listFiles(options: ListFilesOptions = {}): Effect.Effect<ReadonlyArray<string>> {
    const extensions = options.extensions ?? [];

    return Effect.gen(this, function* () {
      const entries = yield* collectTree(this.services.fs, this.baseDir, options.maxDepth);
      const files = entries.filter(
        (entry) =>
          entry.info.type === "File" && (extensions.length === 0 || hasExtension(entry.name, extensions))
      );
      const sorted = yield* this.sortEntries(files, options);
      return sorted.map((entry) => this.formatPath(entry.path, options.relative ?? false));
    });
  }

  listImages(options: ListOptions = {}): Effect.Effect<ReadonlyArray<string>> {
    return this.listFiles({ ...options, extensions: IMAGE_EXTENSIONS });
  }

  /**
   * Directories from and including `baseDir` (depth 0). Sorting by size uses
   * the recursive file-size total of each directory.
   */
  listSubdirs(options: ListOptions = {}): Effect.Effect<ReadonlyArray<string>> {
    const fs = this.services.fs;
    const maxListDepth = options.maxDepth === undefined ? undefined : options.maxDepth - 1;

    return Effect.gen(this, function* () {
      const rootInfo = yield* Effect.option(fs.stat(this.baseDir));
      const below = yield* collectTree(fs, this.baseDir, maxListDepth);

      const directories = below.filter((entry) => entry.info.type === "Directory");
      const root = Option.map(
        rootInfo,
        (info): TreeEntry => ({ path: this.baseDir, name: basename(this.baseDir), depth: 0, info })
      );
      const all = Option.match(root, {
        onNone: () => directories,
        onSome: (entry) => [entry, ...directories],
      });

      const sorted = yield* sortItems(all, options, {
        name: (entry) => entry.name,
        mtime: (entry) => Effect.succeed(entry.info.mtime.getTime()),
        size: (entry) => treeSize(fs, entry.path),
      });

      return sorted.map((entry) => this.formatPath(entry.path, options.relative ?? false));
    });
  }

  /**
   * Remove a directory. Without `recursive` it must be empty.
   */
  deleteDir(
    path: string,
    options: { readonly recursive?: boolean } = {}
  ): Effect.Effect<void, DirectoryNotFound | FsError> {
    const target = this.resolvePath(path);
    return pipe(
      this.statDirectory(target),
      Effect.zipRight(this.services.fs.removeDirectory(target, { recursive: options.recursive ?? false }))
    );
  }

  // ===========================================================================
  // File operations
  // ===========================================================================

  /**
   * Copy a file with its permission bits and timestamps. Returns the
   * destination path.
   */
  copyFile(src: string, dst: string, options: TransferOptions = {}): Effect.Effect<string, FileNotFound | FsError> {
    return pipe(
      this.prepareTransfer(src, dst, options),
      Effect.tap(({ source, target }) => this.services.fs.copyFile(source, target)),
      Effect.map(({ target }) => target)
    );
  }

  /**
   * Move a file. Across filesystems this falls back to copy and unlink, which
   * is not atomic: a failure in between leaves both copies.
   */
  moveFile(src: string, dst: string, options: TransferOptions = {}): Effect.Effect<string, FileNotFound | FsError> {
    const fs = this.services.fs;
    return pipe(
      this.prepareTransfer(src, dst, options),
      Effect.tap(({ source, target }) =>
        pipe(
          fs.rename(source, target),
          Effect.catchTag("CrossDeviceLink", () =>
            pipe(
              Effect.logDebug(`Rename across devices, copying ${source} → ${target}`),
              Effect.zipRight(fs.copyFile(source, target)),
              Effect.zipRight(fs.removeFile(source))
            )
          )
        )
      ),
      Effect.map(({ target }) => target)
    );
  }

  // ===========================================================================
  // Pattern matching and traversal
  // ===========================================================================

  glob(pattern: string, options: RelativeOption = {}): Effect.Effect<ReadonlyArray<string>, GlobError> {
    return pipe(
      this.services.glob.scan(pattern, this.baseDir),
      Effect.map((matches) =>
        matches.map((match) => this.formatPath(resolve(this.baseDir, match), options.relative ?? false))
      )
    );
  }

  /**
   * Lazy top-down walk rooted at `top`, one WalkEntry per directory.
   *
   * Note the two shapes: bare child names by default, but paths relative to
   * `baseDir` (not to the walked directory) when `relative` is set.
   * Symbolic links to directories are reported as subdirectories but not
   * entered. Unreadable directories are skipped.
   */
  walk(
    top = ".",
    options: RelativeOption = {}
  ): Effect.Effect<Stream.Stream<WalkEntry>, DirectoryNotFound | FsError> {
    const fs = this.services.fs;
    const start = this.resolvePath(top);
    const asRelative = options.relative ?? false;

    const classify = (directory: string, name: string) =>
      Effect.gen(function* () {
        const path = join(directory, name);
        const link = yield* Effect.option(fs.lstat(path));
        if (Option.isNone(link)) return { isDirectory: false, descend: false };
        if (link.value.type === "Directory") return { isDirectory: true, descend: true };
        if (link.value.type !== "SymbolicLink") return { isDirectory: false, descend: false };

        const target = yield* Effect.option(fs.stat(path));
        return {
          isDirectory: Option.isSome(target) && target.value.type === "Directory",
          descend: false,
        };
      });

    const step = (pending: ReadonlyArray<string>): Effect.Effect<Option.Option<readonly [WalkEntry, ReadonlyArray<string>]>> =>
      Effect.gen(this, function* () {
        let stack = pending;
        while (stack.length > 0) {
          const directory = stack[stack.length - 1];
          stack = stack.slice(0, -1);
          if (directory === undefined) break;

          const listing = yield* Effect.either(fs.readDirectory(directory));
          if (Either.isLeft(listing)) {
            yield* Effect.logDebug(`Skipping ${directory}: ${listing.left._tag}`);
            continue;
          }

          const subdirectories: Array<string> = [];
          const descend: Array<string> = [];
          const files: Array<string> = [];
          for (const name of listing.right) {
            const kind = yield* classify(directory, name);
            if (kind.isDirectory) subdirectories.push(name);
            else files.push(name);
            if (kind.descend) descend.push(join(directory, name));
          }

          const child = (name: string) => (asRelative ? this.formatPath(join(directory, name), true) : name);
          const entry: WalkEntry = {
            directory: this.formatPath(directory, asRelative),
            subdirectories: subdirectories.map(child),
            files: files.map(child),
          };

          return Option.some([entry, [...stack, ...descend.reverse()]] as const);
        }
        return Option.none();
      });

    const initial: ReadonlyArray<string> = [start];
    return pipe(this.statDirectory(start), Effect.as(Stream.unfoldEffect(initial, step)));
  }

  // ===========================================================================
  // Statistics
  // ===========================================================================

  stats(options: CollectOptions = {}): Effect.Effect<DirStats, DirectoryNotFound | FsError> {
    return pipe(
      this.statDirectory(this.baseDir),
      Effect.zipRight(this.services.analyzer.collect(this.baseDir, options))
    );
  }

  /**
   * Print the statistics report for `baseDir` to standard output.
   */
  displayStats(options: CollectOptions = {}): Effect.Effect<void, DirectoryNotFound | FsError> {
    return pipe(
      this.stats(options),
      Effect.flatMap((stats) => Console.log(formatMinimalDirStatsReport(stats)))
    );
  }
}
