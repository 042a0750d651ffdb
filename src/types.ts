/** Response header attached to every gateway response. */
export type Header = {
  raftTerm: number;
  /** The store-wide logical clock at the time the request was served. */
  revision: number;
  /** Unsigned 64 bit, hence a bigint. */
  clusterId: bigint;
  /** Unsigned 64 bit, hence a bigint. */
  memberId: bigint;
};

/** A key and its value as observed at some revision. Never mutated once decoded. */
export type KeyValue = {
  key: Uint8Array;
  /** Empty when the request asked for keys only. */
  value: Uint8Array;
  /** Number of modifications since the key's current lifetime began. */
  version: number;
  /** Revision at which the key's current lifetime began. */
  createRevision: number;
  /** Revision at which the key was last modified. */
  modRevision: number;
  /** The lease attached to the key, `0n` if none. */
  lease: bigint;
};

export type Status = {
  header: Header;
  /** Server version, e.g. "3.5.12". */
  version: string;
  dbSize: number;
  leader: bigint;
  raftIndex: number;
  raftTerm: number;
};

/** Result of setting a key. */
export type Revision = {
  kind: "revision";
  header: Header;
  /** Only present when the previous value was requested. */
  previous: KeyValue | null;
};

/** Result of deleting a key range. */
export type Deleted = {
  kind: "deleted";
  header: Header;
  deleted: number;
  /** Only filled when the previous values were requested. */
  previous: KeyValue[];
};

/** Result of a range read. */
export type Range = {
  kind: "range";
  header: Header;
  kvs: KeyValue[];
  /** Number of keys in the range, regardless of `limit`. */
  count: number;
  /** Whether `limit` cut the result short. */
  more: boolean;
};

/** One decoded item of a transaction's response list. */
export type TxnResponse = Revision | Deleted | Range;

export type SortOrder = "NONE" | "ASCEND" | "DESCEND";

export type SortTarget = "KEY" | "VERSION" | "CREATE" | "MOD" | "VALUE";

/** Options for range reads, both standalone and inside transactions. */
export type GetOpts = {
  countOnly?: boolean;
  keysOnly?: boolean;
  limit?: number;
  maxCreateRevision?: number;
  minCreateRevision?: number;
  maxModRevision?: number;
  minModRevision?: number;
  /** Point-in-time of the read. The newest revision when unset. */
  revision?: number;
  serializable?: boolean;
  sortOrder?: SortOrder;
  sortTarget?: SortTarget;
};

/** Per-call options understood by every request-issuing method. */
export type CallOpts = {
  /** Milliseconds before the request is aborted. Falls back to the client's timeout. */
  timeout?: number;
};

export type WatchFilter = "noput" | "nodelete";

export type WatchEventType = "put" | "delete";

/** Everything known about a single change, next to the key-value passed to a watch callback. */
export type WatchEvent = {
  type: WatchEventType;
  kv: KeyValue;
  /** Only present when the watch asked for previous values. */
  previous: KeyValue | null;
  header: Header;
  watchId: number;
};
