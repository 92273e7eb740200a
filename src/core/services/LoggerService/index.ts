export { LoggerServiceTag, LoggerServiceLive } from "./LoggerService"
export type { LoggerService, ListingKind } from "./LoggerService"
