/**
 * A client for the HTTP/JSON gateway of an etcd v3 store, and typed persistent maps on top of it.
 *
 * - {@linkcode Client} - key, range and prefix operations, compare-and-branch transactions, watches and leases
 * - {@linkcode Database}, {@linkcode PersistentMap} - typed maps with secondary indexes, written through optimistic transactions
 * - {@linkcode TransportInMemory} - an in-process stand-in for the gateway
 *
 * @module
 */

export type {
  CallOpts,
  Deleted,
  GetOpts,
  Header,
  KeyValue,
  Range,
  Revision,
  SortOrder,
  SortTarget,
  Status,
  TxnResponse,
  WatchEvent,
  WatchEventType,
  WatchFilter,
} from "./src/types.ts";

export * from "./src/key_range.ts";
export * from "./src/transaction.ts";
export * from "./src/client.ts";
export * from "./src/lease.ts";
export * from "./src/config.ts";
export * from "./src/observability.ts";

export {
  Watch,
  type WatchCallback,
  type WatchOpts,
  type WatchState,
} from "./src/watch/watch.ts";

// Transports

export type { Transport, TransportRequestOpts } from "./src/transport/types.ts";
export * from "./src/transport/http.ts";
export * from "./src/transport/in_memory.ts";

// Persistent maps

export * from "./src/db/key_codecs.ts";
export * from "./src/db/value_codecs.ts";
export * from "./src/db/slot.ts";
export * from "./src/db/pmap.ts";
export * from "./src/db/transaction.ts";
export * from "./src/db/database.ts";
export * from "./src/db/events.ts";

// Errors

export * from "./src/errors.ts";
