import { type Pushable, pushable } from "it-pushable";
import { fromString, toString } from "uint8arrays";
import { ProtocolError, TransportError } from "../errors.ts";
import { compareBytes, encodeBase64 } from "../util/bytes.ts";
import {
  expectObject,
  type JsonObject,
  readArray,
  readBigint,
  readBool,
  readBytes,
  readInt,
  readObject,
  readString,
} from "../wire/decode.ts";
import { Endpoints } from "../wire/endpoints.ts";
import type { Transport, TransportRequestOpts } from "./types.ts";

type StoredKv = {
  key: Uint8Array;
  value: Uint8Array;
  version: number;
  createRevision: number;
  modRevision: number;
  lease: bigint;
};

type StoredEvent = {
  type: "PUT" | "DELETE";
  kv: StoredKv;
  prev: StoredKv | null;
};

type Commit = { revision: number; events: StoredEvent[] };

type LeaseState = {
  id: bigint;
  ttl: number;
  expiresAt: number;
  /** Hex encoded. */
  keys: Set<string>;
};

type Watcher = {
  watchId: number;
  start: Uint8Array;
  end: Uint8Array | null;
  noPut: boolean;
  noDelete: boolean;
  prevKv: boolean;
};

type Subscription = {
  watchers: Watcher[];
  queue: Pushable<Uint8Array>;
};

/** An error the gateway would report in the response body. */
class GatewayFailure extends Error {
  constructor(readonly code: number, message: string) {
    super(message);
  }
}

const CLUSTER_ID = "14841639068965178418";
const MEMBER_ID = "10276657743932975437";
const RAFT_TERM = "2";
const FIRST_LEASE_ID = BigInt("7587862103498432000");

export type TransportInMemoryOpts = {
  /** Defaults to `/v3`. */
  apiPrefix?: string;
  /** Clock in milliseconds used for lease expiry. Defaults to `Date.now`. */
  now?: () => number;
  /** Cut the watch stream into chunks of at most this many bytes. */
  chunkSize?: number;
  /** Most comparisons, and most operations per branch, one transaction may hold. Defaults to 128. */
  maxTxnOps?: number;
};

/**
 * A {@linkcode Transport} which answers gateway calls in-memory, from a store
 * held by the transport itself.
 *
 * It speaks the same JSON as the gateway for everything the client sends:
 * revisions, ranges, transactions, leases and watches. There is no persistence,
 * no compaction and no cluster.
 */
export class TransportInMemory implements Transport {
  private revision = 1;
  private kvs = new Map<string, StoredKv>();
  private history: Commit[] = [];
  private leases = new Map<bigint, LeaseState>();
  private nextLeaseId = FIRST_LEASE_ID;
  private subscriptions = new Set<Subscription>();

  private readonly apiPrefix: string;
  private readonly now: () => number;
  private readonly chunkSize: number;
  private readonly maxTxnOps: number;

  /** Every request received, in order. */
  readonly calls: { path: string; body: unknown }[] = [];

  constructor(opts: TransportInMemoryOpts = {}) {
    this.apiPrefix = opts.apiPrefix ?? "/v3";
    this.now = opts.now ?? Date.now;
    this.chunkSize = opts.chunkSize ?? 0;
    this.maxTxnOps = opts.maxTxnOps ?? 128;
  }

  /** The number of watch streams currently open. */
  get openStreams(): number {
    return this.subscriptions.size;
  }

  async request(
    path: string,
    body: unknown,
    opts: TransportRequestOpts = {},
  ): Promise<unknown> {
    this.calls.push({ path, body });

    if (opts.signal?.aborted) {
      throw new TransportError(`POST ${path} failed`, {
        cause: opts.signal.reason,
      });
    }

    const req = expectObject(roundTrip(body ?? {}), "request body");

    this.expireLeases();

    try {
      return this.handle(this.endpoint(path), req);
    } catch (err) {
      if (err instanceof GatewayFailure) {
        return { error: err.message, code: err.code, message: err.message };
      }

      throw err;
    }
  }

  async stream(
    path: string,
    messages: unknown[],
    opts: TransportRequestOpts = {},
  ): Promise<AsyncIterable<Uint8Array>> {
    this.calls.push({ path, body: messages });

    const signal = opts.signal;

    if (signal?.aborted) {
      throw new TransportError(`POST ${path} failed`, { cause: signal.reason });
    }

    if (this.endpoint(path) !== Endpoints.Watch) {
      throw new ProtocolError(`Unexpected response status 404 from ${path}`);
    }

    this.expireLeases();

    const subscription: Subscription = {
      watchers: [],
      queue: pushable<Uint8Array>({
        onEnd: () => {
          this.subscriptions.delete(subscription);
        },
      }),
    };

    for (const message of messages) {
      const create = readObject(
        expectObject(roundTrip(message), "watch request"),
        "create_request",
      );

      if (create === null) {
        continue;
      }

      const filters = readArray(create, "filters");
      const watcher: Watcher = {
        watchId: subscription.watchers.length,
        start: readBytes(create, "key"),
        end: readRangeEnd(create),
        noPut: filters.includes("NOPUT"),
        noDelete: filters.includes("NODELETE"),
        prevKv: readBool(create, "prev_kv"),
      };

      subscription.watchers.push(watcher);

      this.send(subscription, {
        result: {
          header: this.header(),
          watch_id: String(watcher.watchId),
          created: true,
        },
      });

      const startRevision = readInt(create, "start_revision");

      if (startRevision > 0) {
        for (const commit of this.history) {
          if (commit.revision >= startRevision) {
            this.deliverTo(subscription, watcher, commit);
          }
        }
      }
    }

    this.subscriptions.add(subscription);

    if (signal !== undefined) {
      signal.addEventListener("abort", () => {
        const err = new Error("The operation was aborted", {
          cause: signal.reason,
        });

        err.name = "AbortError";
        subscription.queue.end(err);
      }, { once: true });
    }

    return subscription.queue;
  }

  /** End every open watch stream as if the gateway went away, with `err` if given. */
  closeStreams(err?: Error): void {
    for (const subscription of this.subscriptions) {
      subscription.queue.end(err);
    }
  }

  private endpoint(path: string): string | null {
    const prefix = `${this.apiPrefix}/`;

    return path.startsWith(prefix) ? path.slice(prefix.length) : null;
  }

  private handle(endpoint: string | null, req: JsonObject): JsonObject {
    switch (endpoint) {
      case Endpoints.Status:
        return {
          header: this.header(),
          version: "3.5.0",
          dbSize: String(this.kvs.size * 64),
          leader: MEMBER_ID,
          raftIndex: String(this.revision),
          raftTerm: RAFT_TERM,
        };
      case Endpoints.Put:
        return this.commit((revision, events) => this.put(req, revision, events));
      case Endpoints.Range:
        return this.range(req);
      case Endpoints.DeleteRange:
        return this.commit((revision, events) =>
          this.deleteRange(req, revision, events)
        );
      case Endpoints.Txn:
        return this.txn(req);
      case Endpoints.LeaseGrant:
        return this.leaseGrant(req);
      case Endpoints.LeaseKeepAlive:
        return this.leaseKeepAlive(req);
      case Endpoints.LeaseRevoke:
        return this.leaseRevoke(req);
      case Endpoints.LeaseTimeToLive:
        return this.leaseTimeToLive(req);
      default:
        return { code: 5, message: "Not Found" };
    }
  }

  private header(): JsonObject {
    return {
      cluster_id: CLUSTER_ID,
      member_id: MEMBER_ID,
      revision: String(this.revision),
      raft_term: RAFT_TERM,
    };
  }

  private headerAt(revision: number): JsonObject {
    return { ...this.header(), revision: String(revision) };
  }

  /**
   * Run a mutation at the next revision. The revision only advances, and
   * watchers only hear about it, if the mutation produced events.
   */
  private commit(
    mutate: (revision: number, events: StoredEvent[]) => JsonObject,
  ): JsonObject {
    const events: StoredEvent[] = [];
    const response = mutate(this.revision + 1, events);

    if (events.length > 0) {
      this.revision += 1;

      const commit = { revision: this.revision, events };

      this.history.push(commit);
      this.publish(commit);
    }

    return { header: this.header(), ...response };
  }

  private put(
    req: JsonObject,
    revision: number,
    events: StoredEvent[],
  ): JsonObject {
    const key = readBytes(req, "key");
    const leaseId = readBigint(req, "lease");

    this.checkPut(req);

    const id = hex(key);
    const existing = this.kvs.get(id) ?? null;
    const kv: StoredKv = {
      key,
      value: readBytes(req, "value"),
      version: existing === null ? 1 : existing.version + 1,
      createRevision: existing === null ? revision : existing.createRevision,
      modRevision: revision,
      lease: leaseId,
    };

    if (existing !== null && existing.lease !== BigInt(0)) {
      this.leases.get(existing.lease)?.keys.delete(id);
    }

    this.leases.get(leaseId)?.keys.add(id);
    this.kvs.set(id, kv);
    events.push({ type: "PUT", kv, prev: existing });

    return readBool(req, "prev_kv") && existing !== null
      ? { prev_kv: marshalKv(existing) }
      : {};
  }

  private checkPut(req: JsonObject) {
    if (readBytes(req, "key").byteLength === 0) {
      throw new GatewayFailure(3, "etcdserver: key is not provided");
    }

    const leaseId = readBigint(req, "lease");

    if (leaseId !== BigInt(0) && !this.leases.has(leaseId)) {
      throw new GatewayFailure(5, "etcdserver: requested lease not found");
    }
  }

  private deleteRange(
    req: JsonObject,
    revision: number,
    events: StoredEvent[],
  ): JsonObject {
    const matching = this.matching(
      this.kvs,
      readBytes(req, "key"),
      readRangeEnd(req),
    );

    for (const existing of matching) {
      this.remove(existing, revision, events);
    }

    const response: JsonObject = { deleted: String(matching.length) };

    if (readBool(req, "prev_kv") && matching.length > 0) {
      response.prev_kvs = matching.map((kv) => marshalKv(kv));
    }

    return response;
  }

  private remove(existing: StoredKv, revision: number, events: StoredEvent[]) {
    const id = hex(existing.key);

    this.kvs.delete(id);
    this.leases.get(existing.lease)?.keys.delete(id);

    events.push({
      type: "DELETE",
      kv: {
        key: existing.key,
        value: new Uint8Array(),
        version: 0,
        createRevision: 0,
        modRevision: revision,
        lease: BigInt(0),
      },
      prev: existing,
    });
  }

  private range(req: JsonObject): JsonObject {
    const revision = readInt(req, "revision");

    if (revision > this.revision) {
      throw new GatewayFailure(
        11,
        "etcdserver: mvcc: required revision is a future revision",
      );
    }

    const source = revision > 0 ? this.snapshotAt(revision) : this.kvs;

    let kvs = this.matching(source, readBytes(req, "key"), readRangeEnd(req))
      .filter((kv) => withinBounds(req, kv));

    kvs = sortKvs(
      kvs,
      readString(req, "sort_target") || "KEY",
      readString(req, "sort_order") || "NONE",
    );

    const count = kvs.length;
    const limit = readInt(req, "limit");
    const more = limit > 0 && kvs.length > limit;

    if (more) {
      kvs = kvs.slice(0, limit);
    }

    const response: JsonObject = { header: this.header(), count: String(count) };

    if (!readBool(req, "count_only") && kvs.length > 0) {
      const keysOnly = readBool(req, "keys_only");

      response.kvs = kvs.map((kv) => marshalKv(kv, keysOnly));
    }

    if (more) {
      response.more = true;
    }

    return response;
  }

  private snapshotAt(revision: number): Map<string, StoredKv> {
    const snapshot = new Map<string, StoredKv>();

    for (const commit of this.history) {
      if (commit.revision > revision) {
        break;
      }

      for (const event of commit.events) {
        if (event.type === "PUT") {
          snapshot.set(hex(event.kv.key), event.kv);
        } else {
          snapshot.delete(hex(event.kv.key));
        }
      }
    }

    return snapshot;
  }

  private matching(
    source: Map<string, StoredKv>,
    start: Uint8Array,
    end: Uint8Array | null,
  ): StoredKv[] {
    const kvs: StoredKv[] = [];

    for (const kv of source.values()) {
      if (inRange(kv.key, start, end)) {
        kvs.push(kv);
      }
    }

    return kvs.sort((a, b) => compareBytes(a.key, b.key));
  }

  private txn(req: JsonObject): JsonObject {
    for (const field of ["compare", "success", "failure"]) {
      if (readArray(req, field).length > this.maxTxnOps) {
        throw new GatewayFailure(
          3,
          "etcdserver: too many operations in txn request",
        );
      }
    }

    const succeeded = readArray(req, "compare").every((item) =>
      this.evaluate(expectObject(item, "compare"))
    );
    const branch = readArray(req, succeeded ? "success" : "failure").map(
      (item) => expectObject(item, "request op"),
    );

    this.checkBranch(branch);

    const response = this.commit((revision, events) => {
      const responses = branch.map((op): JsonObject => {
        const put = readObject(op, "request_put");

        if (put !== null) {
          return {
            response_put: {
              header: this.headerAt(revision),
              ...this.put(put, revision, events),
            },
          };
        }

        const del = readObject(op, "request_delete_range");

        if (del !== null) {
          return {
            response_delete_range: {
              header: this.headerAt(revision),
              ...this.deleteRange(del, revision, events),
            },
          };
        }

        const range = readObject(op, "request_range");

        if (range !== null) {
          return { response_range: this.range(range) };
        }

        throw new GatewayFailure(3, "etcdserver: unknown request in txn");
      });

      return responses.length > 0 ? { responses } : {};
    });

    return succeeded ? { ...response, succeeded: true } : response;
  }

  /** Refuse a branch up front, so a failing transaction changes nothing. */
  private checkBranch(branch: JsonObject[]) {
    const puts: Uint8Array[] = [];
    const deletes: { start: Uint8Array; end: Uint8Array | null }[] = [];

    for (const op of branch) {
      const put = readObject(op, "request_put");
      const del = readObject(op, "request_delete_range");
      const range = readObject(op, "request_range");

      if (put !== null) {
        this.checkPut(put);

        const key = readBytes(put, "key");

        if (puts.some((other) => compareBytes(other, key) === 0)) {
          throw new GatewayFailure(
            3,
            "etcdserver: duplicate key given in txn request",
          );
        }

        puts.push(key);
      } else if (del !== null) {
        deletes.push({ start: readBytes(del, "key"), end: readRangeEnd(del) });
      } else if (range !== null) {
        if (readInt(range, "revision") > this.revision) {
          throw new GatewayFailure(
            11,
            "etcdserver: mvcc: required revision is a future revision",
          );
        }
      } else {
        throw new GatewayFailure(3, "etcdserver: unknown request in txn");
      }
    }

    for (const del of deletes) {
      if (puts.some((key) => inRange(key, del.start, del.end))) {
        throw new GatewayFailure(
          3,
          "etcdserver: duplicate key given in txn request",
        );
      }
    }
  }

  /** With a `range_end`, every key in the range must satisfy the compare. */
  private evaluate(cmp: JsonObject): boolean {
    const end = readRangeEnd(cmp);

    if (end === null) {
      return this.compareKv(cmp, this.kvs.get(hex(readBytes(cmp, "key"))));
    }

    const kvs = this.matching(this.kvs, readBytes(cmp, "key"), end);

    if (kvs.length === 0) {
      return this.compareKv(cmp, undefined);
    }

    return kvs.every((kv) => this.compareKv(cmp, kv));
  }

  private compareKv(cmp: JsonObject, kv: StoredKv | undefined): boolean {
    const target = readString(cmp, "target") || "VERSION";

    let order: number;

    switch (target) {
      case "VALUE":
        // A missing key has no value to compare against.
        if (kv === undefined) {
          return false;
        }

        order = compareBytes(kv.value, readBytes(cmp, "value"));
        break;
      case "VERSION":
        order = Math.sign((kv?.version ?? 0) - readInt(cmp, "version"));
        break;
      case "CREATE":
        order = Math.sign(
          (kv?.createRevision ?? 0) - readInt(cmp, "create_revision"),
        );
        break;
      case "MOD":
        order = Math.sign(
          (kv?.modRevision ?? 0) - readInt(cmp, "mod_revision"),
        );
        break;
      default:
        throw new GatewayFailure(3, `etcdserver: unknown compare target ${target}`);
    }

    switch (readString(cmp, "result") || "EQUAL") {
      case "EQUAL":
        return order === 0;
      case "NOT_EQUAL":
        return order !== 0;
      case "GREATER":
        return order > 0;
      case "LESS":
        return order < 0;
      default:
        throw new GatewayFailure(3, "etcdserver: unknown compare result");
    }
  }

  private leaseGrant(req: JsonObject): JsonObject {
    const ttl = readInt(req, "TTL");
    let id = readBigint(req, "ID");

    if (id === BigInt(0)) {
      id = this.nextLeaseId;
      this.nextLeaseId += BigInt(1);
    } else if (this.leases.has(id)) {
      throw new GatewayFailure(9, "etcdserver: lease already exists");
    }

    this.leases.set(id, {
      id,
      ttl,
      expiresAt: this.now() + ttl * 1000,
      keys: new Set(),
    });

    return { header: this.header(), ID: id.toString(), TTL: String(ttl) };
  }

  private leaseKeepAlive(req: JsonObject): JsonObject {
    const id = readBigint(req, "ID");
    const lease = this.leases.get(id);

    if (lease === undefined) {
      // The gateway answers an unknown lease with a zero TTL, which it leaves out.
      return { result: { header: this.header(), ID: id.toString() } };
    }

    lease.expiresAt = this.now() + lease.ttl * 1000;

    return {
      result: {
        header: this.header(),
        ID: id.toString(),
        TTL: String(lease.ttl),
      },
    };
  }

  private leaseRevoke(req: JsonObject): JsonObject {
    const id = readBigint(req, "ID");

    if (!this.leases.has(id)) {
      throw new GatewayFailure(5, "etcdserver: requested lease not found");
    }

    this.revokeLease(id);

    return { header: this.header() };
  }

  private leaseTimeToLive(req: JsonObject): JsonObject {
    const id = readBigint(req, "ID");
    const lease = this.leases.get(id);

    if (lease === undefined) {
      return { header: this.header(), ID: id.toString(), TTL: "-1" };
    }

    const response: JsonObject = {
      header: this.header(),
      ID: id.toString(),
      TTL: String(Math.ceil((lease.expiresAt - this.now()) / 1000)),
      grantedTTL: String(lease.ttl),
    };

    if (readBool(req, "keys") && lease.keys.size > 0) {
      response.keys = Array.from(lease.keys).sort().map((key) =>
        encodeBase64(fromString(key, "base16"))
      );
    }

    return response;
  }

  private revokeLease(id: bigint) {
    const lease = this.leases.get(id);

    if (lease === undefined) {
      return;
    }

    this.leases.delete(id);

    this.commit((revision, events) => {
      for (const key of Array.from(lease.keys).sort()) {
        const existing = this.kvs.get(key);

        if (existing !== undefined) {
          this.remove(existing, revision, events);
        }
      }

      return {};
    });
  }

  private expireLeases() {
    const now = this.now();

    for (const lease of Array.from(this.leases.values())) {
      if (now >= lease.expiresAt) {
        this.revokeLease(lease.id);
      }
    }
  }

  private publish(commit: Commit) {
    for (const subscription of this.subscriptions) {
      for (const watcher of subscription.watchers) {
        this.deliverTo(subscription, watcher, commit);
      }
    }
  }

  private deliverTo(
    subscription: Subscription,
    watcher: Watcher,
    commit: Commit,
  ) {
    const events = commit.events.filter((event) => {
      if (event.type === "PUT" ? watcher.noPut : watcher.noDelete) {
        return false;
      }

      return inRange(event.kv.key, watcher.start, watcher.end);
    });

    if (events.length === 0) {
      return;
    }

    this.send(subscription, {
      result: {
        header: this.headerAt(commit.revision),
        watch_id: String(watcher.watchId),
        events: events.map((event) => {
          const marshalled: JsonObject = { kv: marshalKv(event.kv) };

          // PUT is the zero value of the enum and does not appear on the wire.
          if (event.type === "DELETE") {
            marshalled.type = "DELETE";
          }

          if (watcher.prevKv && event.prev !== null) {
            marshalled.prev_kv = marshalKv(event.prev);
          }

          return marshalled;
        }),
      },
    });
  }

  private send(subscription: Subscription, message: JsonObject) {
    const bytes = fromString(`${JSON.stringify(message)}\n`, "utf8");

    if (this.chunkSize <= 0) {
      subscription.queue.push(bytes);
      return;
    }

    for (let i = 0; i < bytes.byteLength; i += this.chunkSize) {
      subscription.queue.push(bytes.subarray(i, i + this.chunkSize));
    }
  }
}

function roundTrip(value: unknown): unknown {
  return JSON.parse(JSON.stringify(value));
}

function hex(bytes: Uint8Array): string {
  return toString(bytes, "base16");
}

/** `null` for a single key, `[0]` for "to the end of the keyspace". */
function readRangeEnd(req: JsonObject): Uint8Array | null {
  const end = readBytes(req, "range_end");

  return end.byteLength === 0 ? null : end;
}

function inRange(
  key: Uint8Array,
  start: Uint8Array,
  end: Uint8Array | null,
): boolean {
  if (end === null) {
    return compareBytes(key, start) === 0;
  }

  if (compareBytes(key, start) < 0) {
    return false;
  }

  return (end.byteLength === 1 && end[0] === 0) || compareBytes(key, end) < 0;
}

function withinBounds(req: JsonObject, kv: StoredKv): boolean {
  const minMod = readInt(req, "min_mod_revision");
  const maxMod = readInt(req, "max_mod_revision");
  const minCreate = readInt(req, "min_create_revision");
  const maxCreate = readInt(req, "max_create_revision");

  return (minMod === 0 || kv.modRevision >= minMod) &&
    (maxMod === 0 || kv.modRevision <= maxMod) &&
    (minCreate === 0 || kv.createRevision >= minCreate) &&
    (maxCreate === 0 || kv.createRevision <= maxCreate);
}

function sortKvs(kvs: StoredKv[], target: string, order: string): StoredKv[] {
  const byTarget = (a: StoredKv, b: StoredKv): number => {
    switch (target) {
      case "VERSION":
        return a.version - b.version;
      case "CREATE":
        return a.createRevision - b.createRevision;
      case "MOD":
        return a.modRevision - b.modRevision;
      case "VALUE":
        return compareBytes(a.value, b.value);
      default:
        return compareBytes(a.key, b.key);
    }
  };

  const sorted = [...kvs].sort(byTarget);

  return order === "DESCEND" ? sorted.reverse() : sorted;
}

/** The gateway leaves out fields holding their zero value. */
function marshalKv(kv: StoredKv, keysOnly = false): JsonObject {
  const obj: JsonObject = { key: encodeBase64(kv.key) };

  if (kv.createRevision !== 0) {
    obj.create_revision = String(kv.createRevision);
  }

  if (kv.modRevision !== 0) {
    obj.mod_revision = String(kv.modRevision);
  }

  if (kv.version !== 0) {
    obj.version = String(kv.version);
  }

  if (!keysOnly && kv.value.byteLength > 0) {
    obj.value = encodeBase64(kv.value);
  }

  if (kv.lease !== BigInt(0)) {
    obj.lease = kv.lease.toString();
  }

  return obj;
}
