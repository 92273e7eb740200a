/**
 * DirectoryAnalyzer - collects a DirStats snapshot in one depth-first pass.
 *
 * The walk is pre-order: a subdirectory is fully processed before its next
 * sibling, so "first seen" (largest-file ties, extension order) follows the
 * enumeration order of each directory. Per-entry and per-directory failures
 * never escape; they only increment `errorsCount`.
 */

import { Clock, Context, Effect, Either, Layer, Option } from "effect";
import { join, resolve } from "node:path";
import {
  RECENT_WINDOW_MS,
  TOP_EXTENSIONS,
  isHiddenName,
  type DirStats,
} from "@domain/DirStats";
import { fromFileName, label, topEntries, type Extension, type ExtensionTally } from "@domain/Extension";
import {
  FileSystemServiceTag,
  type FileInfo,
  type FileSystemService,
} from "../FileSystemService";

// =============================================================================
// Service interface
// =============================================================================

export interface CollectOptions {
  readonly followSymlinks?: boolean;
}

export interface DirectoryAnalyzer {
  readonly collect: (root: string, options?: CollectOptions) => Effect.Effect<DirStats>;
}

export class DirectoryAnalyzerTag extends Context.Tag("DirectoryAnalyzer")<
  DirectoryAnalyzerTag,
  DirectoryAnalyzer
>() {}

// =============================================================================
// Accumulator
// =============================================================================

interface ExtensionBucket {
  readonly extension: Extension;
  count: number;
  sizeBytes: number;
}

const freezeTally = (tally: ExtensionTally): ExtensionTally =>
  Object.freeze(tally.map((pair) => Object.freeze(pair)));

class StatsAccumulator {
  fileCount = 0;
  directoryCount = 0;
  symlinkCount = 0;
  totalSizeBytes = 0;
  largestFileSizeBytes = 0;
  largestFilePath: Option.Option<string> = Option.none();
  oldestMtimeMs: Option.Option<number> = Option.none();
  newestMtimeMs: Option.Option<number> = Option.none();
  filesModifiedLast30d = 0;
  emptyDirectories = 0;
  zeroByteFiles = 0;
  hiddenFiles = 0;
  hiddenDirectories = 0;
  errorsCount = 0;

  private readonly buckets = new Map<string, ExtensionBucket>();

  constructor(
    readonly root: string,
    readonly now: number
  ) {}

  recordDirectory(entryCount: number): void {
    this.directoryCount += 1;
    if (entryCount === 0) this.emptyDirectories += 1;
  }

  recordFile(path: string, name: string, info: FileInfo): void {
    const size = info.size;
    const mtimeMs = info.mtime.getTime();

    this.fileCount += 1;
    if (isHiddenName(name)) this.hiddenFiles += 1;

    this.totalSizeBytes += size;
    if (size === 0) this.zeroByteFiles += 1;

    if (Option.isNone(this.largestFilePath) || size > this.largestFileSizeBytes) {
      this.largestFileSizeBytes = size;
      this.largestFilePath = Option.some(path);
    }

    const extension = fromFileName(name);
    const key = label(extension);
    const bucket = this.buckets.get(key);
    if (bucket) {
      bucket.count += 1;
      bucket.sizeBytes += size;
    } else {
      this.buckets.set(key, { extension, count: 1, sizeBytes: size });
    }

    this.oldestMtimeMs = Option.some(
      Option.match(this.oldestMtimeMs, { onNone: () => mtimeMs, onSome: (t) => Math.min(t, mtimeMs) })
    );
    this.newestMtimeMs = Option.some(
      Option.match(this.newestMtimeMs, { onNone: () => mtimeMs, onSome: (t) => Math.max(t, mtimeMs) })
    );

    if (this.now - mtimeMs <= RECENT_WINDOW_MS) this.filesModifiedLast30d += 1;
  }

  snapshot(): DirStats {
    const buckets = Array.from(this.buckets.values());
    const extensionCount = freezeTally(buckets.map((b) => [b.extension, b.count] as const));
    const extensionSize = freezeTally(buckets.map((b) => [b.extension, b.sizeBytes] as const));

    return Object.freeze({
      root: this.root,
      fileCount: this.fileCount,
      directoryCount: this.directoryCount,
      symlinkCount: this.symlinkCount,
      totalSizeBytes: this.totalSizeBytes,
      largestFileSizeBytes: this.largestFileSizeBytes,
      largestFilePath: this.largestFilePath,
      extensionCount,
      extensionSize,
      topExtensionsBySize: freezeTally(topEntries(extensionSize, TOP_EXTENSIONS)),
      topExtensionsByCount: freezeTally(topEntries(extensionCount, TOP_EXTENSIONS)),
      oldestMtime: Option.map(this.oldestMtimeMs, (ms) => new Date(ms)),
      newestMtime: Option.map(this.newestMtimeMs, (ms) => new Date(ms)),
      filesModifiedLast30d: this.filesModifiedLast30d,
      emptyDirectories: this.emptyDirectories,
      zeroByteFiles: this.zeroByteFiles,
      hiddenFiles: this.hiddenFiles,
      hiddenDirectories: this.hiddenDirectories,
      errorsCount: this.errorsCount,
    });
  }
}

// =============================================================================
// Traversal
// =============================================================================

interface Frame {
  readonly directory: string;
  /** dev:ino of `directory`, when it could be stat'ed. */
  readonly identity: string | undefined;
  readonly entries: ReadonlyArray<string>;
  next: number;
}

interface Traversal {
  readonly fs: FileSystemService;
  readonly acc: StatsAccumulator;
  readonly stack: Array<Frame>;
  readonly followSymlinks: boolean;
}

const identity = (info: FileInfo): string => `${info.dev}:${info.ino}`;

const enterDirectory = (
  t: Traversal,
  directory: string,
  key: string | undefined
): Effect.Effect<void> =>
  Effect.gen(function* () {
    const listing = yield* Effect.either(t.fs.readDirectory(directory));
    if (Either.isLeft(listing)) {
      t.acc.errorsCount += 1;
      yield* Effect.logDebug(`Cannot list ${directory}: ${listing.left._tag}`);
      return;
    }

    t.acc.recordDirectory(listing.right.length);
    t.stack.push({ directory, identity: key, entries: listing.right, next: 0 });
  });

const visitEntry = (t: Traversal, path: string, name: string): Effect.Effect<void> =>
  Effect.gen(function* () {
    const linkInfo = yield* Effect.either(t.fs.lstat(path));
    if (Either.isLeft(linkInfo)) {
      t.acc.errorsCount += 1;
      yield* Effect.logDebug(`Cannot stat ${path}: ${linkInfo.left._tag}`);
      return;
    }

    let info = linkInfo.right;

    if (info.type === "SymbolicLink") {
      t.acc.symlinkCount += 1;
      if (!t.followSymlinks) return;

      const target = yield* Effect.either(t.fs.stat(path));
      if (Either.isLeft(target)) {
        // Dangling links resolve to nothing and are neither files nor directories
        if (target.left._tag !== "PathNotFound") {
          t.acc.errorsCount += 1;
          yield* Effect.logDebug(`Cannot resolve ${path}: ${target.left._tag}`);
        }
        return;
      }
      info = target.right;
    }

    switch (info.type) {
      case "Directory": {
        if (isHiddenName(name)) t.acc.hiddenDirectories += 1;
        const key = identity(info);
        // Only a followed link can lead back to an ancestor
        if (t.stack.some((frame) => frame.identity === key)) {
          yield* Effect.logDebug(`Not entering ${path}: it links back to an ancestor`);
          return;
        }
        yield* enterDirectory(t, path, key);
        return;
      }
      case "File":
        t.acc.recordFile(path, name, info);
        return;
      default:
        return;
    }
  });

const collectWith =
  (fs: FileSystemService): DirectoryAnalyzer["collect"] =>
  (root, options = {}) =>
    Effect.gen(function* () {
      const absoluteRoot = resolve(root);
      const now = yield* Clock.currentTimeMillis;
      const t: Traversal = {
        fs,
        acc: new StatsAccumulator(absoluteRoot, now),
        stack: [],
        followSymlinks: options.followSymlinks ?? false,
      };

      const rootInfo = yield* Effect.option(fs.stat(absoluteRoot));

      yield* Effect.logDebug(`Collecting stats for ${absoluteRoot}`);
      yield* enterDirectory(t, absoluteRoot, Option.getOrUndefined(Option.map(rootInfo, identity)));

      while (t.stack.length > 0) {
        const frame = t.stack[t.stack.length - 1];
        if (frame === undefined) break;

        const name = frame.entries[frame.next];
        if (name === undefined) {
          t.stack.pop();
          continue;
        }
        frame.next += 1;

        yield* visitEntry(t, join(frame.directory, name), name);
      }

      return t.acc.snapshot();
    });

// =============================================================================
// Live implementation
// =============================================================================

export const DirectoryAnalyzerLive = Layer.effect(
  DirectoryAnalyzerTag,
  Effect.map(FileSystemServiceTag, (fs) => ({ collect: collectWith(fs) }))
);
