import { Data } from "effect";

export class FileNotFound extends Data.TaggedError("FileNotFound")<{
  readonly path: string;
}> {}

export class DirectoryNotFound extends Data.TaggedError("DirectoryNotFound")<{
  readonly path: string;
}> {}
