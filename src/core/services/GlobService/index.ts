export { GlobServiceTag, GlobServiceLive, GlobPermissionDenied, GlobFailed } from "./GlobService";
export type { GlobService, GlobError } from "./GlobService";
