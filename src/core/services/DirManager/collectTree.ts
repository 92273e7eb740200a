import { Effect, Either, Option } from "effect";
import { join } from "node:path";
import type { FileInfo, FileSystemService } from "../FileSystemService";

export interface TreeEntry {
  readonly path: string;
  readonly name: string;
  /** Depth of the directory holding this entry; entries of the root are at 0. */
  readonly depth: number;
  /** Metadata of what the entry resolves to. */
  readonly info: FileInfo;
}

interface Frame {
  readonly directory: string;
  readonly depth: number;
  /** dev:ino of `directory`, when it could be stat'ed. */
  readonly identity: string | undefined;
  readonly entries: ReadonlyArray<string>;
  next: number;
}

/**
 * Pre-order listing of everything below `root`, following symbolic links.
 *
 * Only directories at depth <= `maxListDepth` are listed. Unreadable
 * directories and entries that vanish or cannot be stat'ed are skipped. A
 * directory that is also one of its own ancestors (same dev:ino) is listed
 * but not entered; any other directory is entered on every path that reaches it.
 */
export const collectTree = (
  fs: FileSystemService,
  root: string,
  maxListDepth?: number
): Effect.Effect<ReadonlyArray<TreeEntry>> =>
  Effect.gen(function* () {
    const found: Array<TreeEntry> = [];
    const stack: Array<Frame> = [];

    const identity = (info: FileInfo) => `${info.dev}:${info.ino}`;

    const isAncestor = (key: string) => stack.some((frame) => frame.identity === key);

    const enter = (directory: string, depth: number, key: string | undefined) =>
      Effect.gen(function* () {
        if (maxListDepth !== undefined && depth > maxListDepth) return;

        const listing = yield* Effect.either(fs.readDirectory(directory));
        if (Either.isLeft(listing)) {
          yield* Effect.logDebug(`Skipping ${directory}: ${listing.left._tag}`);
          return;
        }
        stack.push({ directory, depth, identity: key, entries: listing.right, next: 0 });
      });

    const rootInfo = yield* Effect.option(fs.stat(root));
    yield* enter(root, 0, Option.getOrUndefined(Option.map(rootInfo, identity)));

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame === undefined) break;

      const name = frame.entries[frame.next];
      if (name === undefined) {
        stack.pop();
        continue;
      }
      frame.next += 1;

      const path = join(frame.directory, name);
      const info = yield* Effect.option(fs.stat(path));
      if (Option.isNone(info)) continue;

      found.push({ path, name, depth: frame.depth, info: info.value });

      if (info.value.type === "Directory") {
        const key = identity(info.value);
        if (isAncestor(key)) {
          yield* Effect.logDebug(`Not entering ${path}: it links back to an ancestor`);
          continue;
        }
        yield* enter(path, frame.depth + 1, key);
      }
    }

    return found;
  });

export const treeSize = (fs: FileSystemService, root: string): Effect.Effect<number> =>
  Effect.map(collectTree(fs, root), (entries) =>
    entries.reduce((sum, entry) => (entry.info.type === "File" ? sum + entry.info.size : sum), 0)
  );
