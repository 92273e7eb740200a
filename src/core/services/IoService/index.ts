export {
  IoServiceTag,
  IoServiceLive,
  UnsupportedHashAlgorithm,
  JsonParseError,
  JsonDecodeError,
  SerializeError,
  DeserializeError,
} from "./IoService";
export type {
  IoService,
  ReadError,
  WriteOptions,
  TextOptions,
  JsonWriteOptions,
  HashOptions,
} from "./IoService";
