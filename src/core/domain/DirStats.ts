import type { Option } from "effect";
import type { ExtensionTally } from "./Extension";

export const TOP_EXTENSIONS = 5;

export const RECENT_WINDOW_MS = 30 * 86_400 * 1000;

/**
 * Snapshot of one directory scan. Produced once, never mutated.
 */
export interface DirStats {
  // Context
  readonly root: string;

  // Structure
  readonly fileCount: number;
  readonly directoryCount: number;
  readonly symlinkCount: number;

  // Size
  readonly totalSizeBytes: number;
  readonly largestFileSizeBytes: number;
  readonly largestFilePath: Option.Option<string>;

  // Composition
  readonly extensionCount: ExtensionTally;
  readonly extensionSize: ExtensionTally;
  readonly topExtensionsBySize: ExtensionTally;
  readonly topExtensionsByCount: ExtensionTally;

  // Time
  readonly oldestMtime: Option.Option<Date>;
  readonly newestMtime: Option.Option<Date>;
  readonly filesModifiedLast30d: number;

  // Hygiene
  readonly emptyDirectories: number;
  readonly zeroByteFiles: number;
  readonly hiddenFiles: number;
  readonly hiddenDirectories: number;

  // Meta
  readonly errorsCount: number;
}

export const isHiddenName = (name: string): boolean => name.startsWith(".");
