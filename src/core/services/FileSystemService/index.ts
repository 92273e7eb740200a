export {
  FileSystemServiceTag,
  FileSystemServiceLive,
  PathNotFound,
  PathPermissionDenied,
  PathAlreadyExists,
  NotADirectory,
  IsADirectory,
  DirectoryNotEmpty,
  CrossDeviceLink,
  FsUnknownError,
  toFsError
} from "./FileSystemService";
export type { FileSystemService, FsError, FileInfo, FileType } from "./FileSystemService";
