import { Match } from "effect";

import type { DirectoryNotFound, FileNotFound } from "@domain/errors";
import type { BaseDirNotFound } from "@services/DirManager";
import type { FsError } from "@services/FileSystemService";
import type { GlobError } from "@services/GlobService";
import type {
  DeserializeError,
  JsonDecodeError,
  JsonParseError,
  SerializeError,
  UnsupportedHashAlgorithm
} from "@services/IoService";

type DomainError =
  | FsError
  | GlobError
  | FileNotFound
  | DirectoryNotFound
  | BaseDirNotFound
  | UnsupportedHashAlgorithm
  | JsonParseError
  | JsonDecodeError
  | SerializeError
  | DeserializeError;

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const errors = {
  baseDirNotFound: (path: string) =>
    new AppError(
      "Base directory not found",
      `The directory "${path}" does not exist.`,
      `Pass an existing directory with --path, or run the command from inside one.`
    ),

  fileNotFound: (path: string) =>
    new AppError(
      "File not found",
      `The file "${path}" does not exist.`,
      `Check the spelling of the path. Relative paths are resolved against the base directory.`
    ),

  directoryNotFound: (path: string) =>
    new AppError(
      "Directory not found",
      `The directory "${path}" does not exist.`,
      `Check the spelling of the path, or create it first.`
    ),

  notADirectory: (path: string) =>
    new AppError(
      "Not a directory",
      `The path "${path}" exists but is not a directory.`,
      `Point the command at a directory instead of a file.`
    ),

  isADirectory: (path: string) =>
    new AppError(
      "Not a regular file",
      `The path "${path}" is a directory or another non-file entry.`,
      `This operation works on regular files only.`
    ),

  alreadyExists: (path: string) =>
    new AppError(
      "Already exists",
      `The path "${path}" already exists.`,
      `Choose another name, or allow existing directories.`
    ),

  directoryNotEmpty: (path: string) =>
    new AppError(
      "Directory not empty",
      `The directory "${path}" still has contents.`,
      `Remove its contents first, or delete recursively.`
    ),

  permissionDenied: (path: string) =>
    new AppError(
      "Permission denied",
      `Cannot access "${path}": permission denied.`,
      `Check that you have the required permissions. You may need to run with elevated privileges.`
    ),

  crossDevice: (path: string) =>
    new AppError(
      "Cross-device rename",
      `Cannot rename "${path}" across filesystems.`,
      `Copy the file to the destination and delete the original instead.`
    ),

  unsupportedAlgorithm: (algorithm: string) =>
    new AppError(
      "Unsupported hash algorithm",
      `"${algorithm}" is not a hash algorithm this Node.js build provides.`,
      `Use one of md5, sha1, sha256 or sha512.`
    ),

  invalidData: (path: string, reason: string) =>
    new AppError(
      "Invalid file contents",
      `Could not decode "${path}": ${reason}`,
      `Check that the file was written by the matching writer and is not truncated.`
    ),

  globFailed: (path: string, pattern: string, reason: string) =>
    new AppError(
      "Pattern matching failed",
      `Could not match "${pattern}" under "${path}": ${reason}`,
      `Check the pattern syntax and that the directory is readable.`
    ),

  fsFailed: (path: string, reason: string) =>
    new AppError(
      "Filesystem error",
      `Operation on "${path}" failed: ${reason}`,
      `Check that the path is accessible and the disk is healthy.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`)
};

const matchDomainError = Match.typeTags<DomainError>()({
  PathNotFound: (e) => errors.fileNotFound(e.path),
  PathPermissionDenied: (e) => errors.permissionDenied(e.path),
  PathAlreadyExists: (e) => errors.alreadyExists(e.path),
  NotADirectory: (e) => errors.notADirectory(e.path),
  IsADirectory: (e) => errors.isADirectory(e.path),
  DirectoryNotEmpty: (e) => errors.directoryNotEmpty(e.path),
  CrossDeviceLink: (e) => errors.crossDevice(e.path),
  FsUnknownError: (e) => errors.fsFailed(e.path, e.reason),

  GlobPermissionDenied: (e) => errors.permissionDenied(e.path),
  GlobFailed: (e) => errors.globFailed(e.path, e.pattern, e.reason),

  FileNotFound: (e) => errors.fileNotFound(e.path),
  DirectoryNotFound: (e) => errors.directoryNotFound(e.path),
  BaseDirNotFound: (e) => errors.baseDirNotFound(e.path),

  UnsupportedHashAlgorithm: (e) => errors.unsupportedAlgorithm(e.algorithm),
  JsonParseError: (e) => errors.invalidData(e.path, e.reason),
  JsonDecodeError: (e) => errors.invalidData(e.path, e.reason),
  SerializeError: (e) => errors.fsFailed(e.path, e.reason),
  DeserializeError: (e) => errors.invalidData(e.path, e.reason)
});

const domainTags: ReadonlySet<string> = new Set<DomainError["_tag"]>([
  "PathNotFound",
  "PathPermissionDenied",
  "PathAlreadyExists",
  "NotADirectory",
  "IsADirectory",
  "DirectoryNotEmpty",
  "CrossDeviceLink",
  "FsUnknownError",
  "GlobPermissionDenied",
  "GlobFailed",
  "FileNotFound",
  "DirectoryNotFound",
  "BaseDirNotFound",
  "UnsupportedHashAlgorithm",
  "JsonParseError",
  "JsonDecodeError",
  "SerializeError",
  "DeserializeError"
]);

const isDomainError = (e: unknown): e is DomainError =>
  typeof e === "object" && e !== null && "_tag" in e && typeof e._tag === "string" && domainTags.has(e._tag);

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isDomainError(error)) {
    return matchDomainError(error);
  }

  if (error instanceof Error) {
    return errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
};

export const {
  baseDirNotFound,
  fileNotFound,
  directoryNotFound,
  notADirectory,
  isADirectory,
  alreadyExists,
  directoryNotEmpty,
  permissionDenied,
  crossDevice,
  unsupportedAlgorithm,
  invalidData,
  globFailed,
  fsFailed,
  unexpected
} = errors;
