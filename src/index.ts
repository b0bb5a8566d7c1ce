export { FileBlobStorage, type BlobStorage } from "./blob_storage.js";
export { parseConfig, buildProgram, ConfigSchema, type ServerConfig } from "./config.js";
export {
  BatchSchema,
  CollectionSchema,
  EntrySchema,
  NewEntrySchema,
  decodeBatch,
  decodeCollection,
  encodeCollection,
  type Entry,
  type NewEntry,
} from "./entry.js";
export { HTTPError, StoreError, type StoreErrorKind } from "./errors.js";
export { parseContentLength, parseHeaderLine, parseHeaders, parseRequestLine } from "./http_parser.js";
export { logger, setLogLevel, type LogLevel } from "./logger.js";
export { Mutex } from "./mutex.js";
export { RecordStore } from "./record_store.js";
export { createEntryServer, type EntryServer, type EntryServerOptions } from "./server.js";
