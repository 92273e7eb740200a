export { DirManager, BaseDirNotFound } from "./DirManager";
/** Earlier name of DirManager, still exported for existing callers. */
export { DirManager as FileSystem } from "./DirManager";
export type {
  ListFilesOptions,
  ListOptions,
  RelativeOption,
  ScanOptions,
  TransferOptions,
  WalkEntry,
} from "./DirManager";
export type { SortBy, SortOptions } from "./sorting";
