import { ProtocolError, StoreError } from "../errors.ts";
import type {
  Deleted,
  Header,
  KeyValue,
  Range,
  Revision,
  Status,
  TxnResponse,
  WatchEvent,
} from "../types.ts";
import { decodeBase64 } from "../util/bytes.ts";

export type JsonObject = { [key: string]: unknown };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function expectObject(value: unknown, what: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new ProtocolError(`Expected ${what} to be a JSON object`);
  }

  return value;
}

/**
 * Throw the error a response body carries, if any.
 *
 * The gateway reports errors either as `{ "error": "...", "code": 3 }` or as
 * `{ "code": 3, "message": "..." }` depending on its version.
 */
export function throwIfError(body: JsonObject): void {
  if ("error" in body) {
    const message = typeof body.error === "string"
      ? body.error
      : JSON.stringify(body.error);

    throw new StoreError(readInt(body, "code"), message);
  }

  if ("code" in body && "message" in body && readInt(body, "code") !== 0) {
    throw new StoreError(readInt(body, "code"), readString(body, "message"));
  }
}

// Integers are int64 in the store and arrive as decimal strings. Absent fields
// are zero values the gateway chose not to print.

export function readInt(obj: JsonObject, field: string): number {
  const raw = obj[field];

  if (raw === undefined || raw === null) {
    return 0;
  }

  if (typeof raw === "number" && Number.isInteger(raw)) {
    return raw;
  }

  if (typeof raw === "string" && /^-?\d+$/.test(raw)) {
    return Number.parseInt(raw, 10);
  }

  throw new ProtocolError(
    `Expected "${field}" to be an integer, got ${JSON.stringify(raw)}`,
  );
}

export function readBigint(obj: JsonObject, field: string): bigint {
  const raw = obj[field];

  if (raw === undefined || raw === null) {
    return BigInt(0);
  }

  if (
    (typeof raw === "number" && Number.isInteger(raw)) ||
    (typeof raw === "string" && /^-?\d+$/.test(raw))
  ) {
    return BigInt(raw);
  }

  throw new ProtocolError(
    `Expected "${field}" to be an integer, got ${JSON.stringify(raw)}`,
  );
}

export function readBytes(obj: JsonObject, field: string): Uint8Array {
  const raw = obj[field];

  if (raw === undefined || raw === null) {
    return new Uint8Array();
  }

  if (typeof raw !== "string") {
    throw new ProtocolError(`Expected "${field}" to be a base64 string`);
  }

  return decodeBase64(raw);
}

export function readBool(obj: JsonObject, field: string): boolean {
  const raw = obj[field];

  if (raw === undefined || raw === null) {
    return false;
  }

  if (typeof raw !== "boolean") {
    throw new ProtocolError(`Expected "${field}" to be a boolean`);
  }

  return raw;
}

export function readString(obj: JsonObject, field: string): string {
  const raw = obj[field];

  if (raw === undefined || raw === null) {
    return "";
  }

  if (typeof raw !== "string") {
    throw new ProtocolError(`Expected "${field}" to be a string`);
  }

  return raw;
}

export function readArray(obj: JsonObject, field: string): unknown[] {
  const raw = obj[field];

  if (raw === undefined || raw === null) {
    return [];
  }

  if (!Array.isArray(raw)) {
    throw new ProtocolError(`Expected "${field}" to be an array`);
  }

  return raw;
}

export function readObject(obj: JsonObject, field: string): JsonObject | null {
  const raw = obj[field];

  if (raw === undefined || raw === null) {
    return null;
  }

  return expectObject(raw, `"${field}"`);
}

const EMPTY_HEADER: Header = Object.freeze({
  raftTerm: 0,
  revision: 0,
  clusterId: BigInt(0),
  memberId: BigInt(0),
});

export function decodeHeader(obj: JsonObject | null): Header {
  if (obj === null) {
    return EMPTY_HEADER;
  }

  return {
    raftTerm: readInt(obj, "raft_term"),
    revision: readInt(obj, "revision"),
    clusterId: readBigint(obj, "cluster_id"),
    memberId: readBigint(obj, "member_id"),
  };
}

export function decodeKeyValue(raw: unknown): KeyValue {
  const obj = expectObject(raw, "key-value");

  return Object.freeze({
    key: readBytes(obj, "key"),
    value: readBytes(obj, "value"),
    version: readInt(obj, "version"),
    createRevision: readInt(obj, "create_revision"),
    modRevision: readInt(obj, "mod_revision"),
    lease: readBigint(obj, "lease"),
  });
}

/** Parse a response body, throwing the store's error if it carries one. */
export function decodeBody(raw: unknown): JsonObject {
  const body = expectObject(raw, "response body");

  throwIfError(body);

  return body;
}

export function decodeStatus(raw: unknown): Status {
  const body = decodeBody(raw);

  return {
    header: decodeHeader(readObject(body, "header")),
    version: readString(body, "version"),
    dbSize: readInt(body, "dbSize"),
    leader: readBigint(body, "leader"),
    raftIndex: readInt(body, "raftIndex"),
    raftTerm: readInt(body, "raftTerm"),
  };
}

export function decodeRevision(raw: unknown): Revision {
  const body = decodeBody(raw);
  const prev = readObject(body, "prev_kv");

  return {
    kind: "revision",
    header: decodeHeader(readObject(body, "header")),
    previous: prev === null ? null : decodeKeyValue(prev),
  };
}

export function decodeDeleted(raw: unknown): Deleted {
  const body = decodeBody(raw);

  return {
    kind: "deleted",
    header: decodeHeader(readObject(body, "header")),
    deleted: readInt(body, "deleted"),
    previous: readArray(body, "prev_kvs").map(decodeKeyValue),
  };
}

export function decodeRange(raw: unknown): Range {
  const body = decodeBody(raw);

  return {
    kind: "range",
    header: decodeHeader(readObject(body, "header")),
    kvs: readArray(body, "kvs").map(decodeKeyValue),
    count: readInt(body, "count"),
    more: readBool(body, "more"),
  };
}

/** The server's verdict on a transaction, with the executed branch's results in order. */
export type TxnResult = {
  succeeded: boolean;
  header: Header;
  responses: TxnResponse[];
};

export function decodeTxn(raw: unknown): TxnResult {
  const body = decodeBody(raw);

  const responses = readArray(body, "responses").map((item, i) => {
    const obj = expectObject(item, `transaction response ${i}`);
    const tags = Object.keys(obj);

    if (tags.length !== 1) {
      throw new ProtocolError(
        `Bogus transaction response (${tags.length} response tags in item ${i}): ${
          JSON.stringify(obj)
        }`,
      );
    }

    const tag = tags[0];

    switch (tag) {
      case "response_put":
        return decodeRevision(obj[tag]);
      case "response_delete_range":
        return decodeDeleted(obj[tag]);
      case "response_range":
        return decodeRange(obj[tag]);
      default:
        throw new ProtocolError(
          `Transaction response item "${tag}" is bogus or not implemented`,
        );
    }
  });

  return {
    succeeded: readBool(body, "succeeded"),
    header: decodeHeader(readObject(body, "header")),
    responses,
  };
}

export type LeaseGrant = {
  header: Header;
  id: bigint;
  ttl: number;
};

export function decodeLeaseGrant(raw: unknown): LeaseGrant {
  const body = decodeBody(raw);

  return {
    header: decodeHeader(readObject(body, "header")),
    id: readBigint(body, "ID"),
    ttl: readInt(body, "TTL"),
  };
}

export type LeaseKeepAlive = {
  header: Header;
  id: bigint;
  /** Zero or below once the lease is gone. */
  ttl: number;
};

/** Keepalive is a streaming call; the gateway wraps each answer in `result`. */
export function decodeLeaseKeepAlive(raw: unknown): LeaseKeepAlive {
  const body = decodeBody(raw);
  const result = readObject(body, "result");

  if (result === null) {
    throw new ProtocolError(
      `Bogus lease refresh response (missing "result") in ${JSON.stringify(body)}`,
    );
  }

  throwIfError(result);

  return {
    header: decodeHeader(readObject(result, "header")),
    id: readBigint(result, "ID"),
    ttl: readInt(result, "TTL"),
  };
}

export type LeaseTimeToLive = {
  header: Header;
  id: bigint;
  /** Zero or below once the lease is gone. */
  ttl: number;
  grantedTtl: number;
  keys: Uint8Array[];
};

export function decodeLeaseTimeToLive(raw: unknown): LeaseTimeToLive {
  const body = decodeBody(raw);

  return {
    header: decodeHeader(readObject(body, "header")),
    id: readBigint(body, "ID"),
    ttl: readInt(body, "TTL"),
    grantedTtl: readInt(body, "grantedTTL"),
    keys: readArray(body, "keys").map((key, i) => {
      if (typeof key !== "string") {
        throw new ProtocolError(`Expected lease key ${i} to be a base64 string`);
      }

      return decodeBase64(key);
    }),
  };
}

export function decodeHeaderOnly(raw: unknown): Header {
  return decodeHeader(readObject(decodeBody(raw), "header"));
}

export type WatchMessage = {
  header: Header;
  watchId: number;
  created: boolean;
  canceled: boolean;
  cancelReason: string;
  compactRevision: number;
  events: WatchEvent[];
};

/** One line of the watch stream: `{ "result": { ... } }`, or an error object. */
export function decodeWatchMessage(raw: unknown): WatchMessage {
  const body = decodeBody(raw);
  const result = readObject(body, "result");

  if (result === null) {
    throw new ProtocolError(
      `Bogus watch message (missing "result") in ${JSON.stringify(body)}`,
    );
  }

  const header = decodeHeader(readObject(result, "header"));
  const watchId = readInt(result, "watch_id");

  return {
    header,
    watchId,
    created: readBool(result, "created"),
    canceled: readBool(result, "canceled"),
    cancelReason: readString(result, "cancel_reason"),
    compactRevision: readInt(result, "compact_revision"),
    events: readArray(result, "events").flatMap<WatchEvent>((item, i) => {
      const event = expectObject(item, `watch event ${i}`);
      const kv = readObject(event, "kv");

      if (kv === null) {
        return [];
      }

      const prev = readObject(event, "prev_kv");

      return [{
        type: readString(event, "type") === "DELETE" ? "delete" : "put",
        kv: decodeKeyValue(kv),
        previous: prev === null ? null : decodeKeyValue(prev),
        header,
        watchId,
      }];
    }),
  };
}
