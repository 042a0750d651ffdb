import { toString } from "uint8arrays";
import type { Client } from "../client.ts";
import {
  TransactionConflictError,
  ValidationError,
} from "../errors.ts";
import { fromKey, range, single } from "../key_range.ts";
import type { Logger } from "../observability.ts";
import {
  type Comparator,
  compareModified,
  type Operation,
  opDelete,
  opGet,
  opSet,
  type SubmitOutcome,
  transaction,
} from "../transaction.ts";
import type { TxnResponse } from "../types.ts";
import { compareBytes, OPEN_END } from "../util/bytes.ts";
import { TransactionAbortEvent, TransactionCommitEvent } from "./events.ts";

/** Per-scope counters. Pass the same instance to several scopes to add them up. */
export class DbTransactionStats {
  puts = 0;
  deletes = 0;
  private startedAt = performance.now();

  /** Milliseconds since creation or the last {@linkcode reset}. */
  get duration(): number {
    return performance.now() - this.startedAt;
  }

  reset() {
    this.puts = 0;
    this.deletes = 0;
    this.startedAt = performance.now();
  }
}

/** What a scope needs from the {@linkcode Database} that opened it. */
export interface TransactionHost {
  readonly client: Client;
  readonly logger: Logger;
  dispatchEvent(event: Event): boolean;
}

export type DbTransactionOpts = {
  /** Allow `put` and `delete`. Defaults to false. */
  write?: boolean;
  stats?: DbTransactionStats;
  /** Milliseconds allowed for each request the scope makes. */
  timeout?: number;
};

export type DbTransactionState = "idle" | "open" | "committed" | "rolledBack";

/** A stored key and its value. The value is empty when only keys were asked for. */
export type StoredPair = { key: Uint8Array; value: Uint8Array };

type Pending =
  | { op: "put"; key: Uint8Array; value: Uint8Array }
  | { op: "delete"; key: Uint8Array };

type Read = { key: Uint8Array; modRevision: number };

type RangeRead = { start: Uint8Array; end: Uint8Array };

type Guard = {
  comparator: Comparator;
  /** Read back in the failure branch. */
  check: Operation;
  /** The keys that moved, given what `check` read. */
  moved: (response: TxnResponse) => Uint8Array[];
};

/**
 * A unit of work over the raw keyspace with optimistic concurrency control.
 *
 * Reads see the store as of {@linkcode baseRevision} plus the scope's own writes.
 * Writes are buffered and sent as one transaction on {@linkcode commit}, which
 * only applies if no key the scope read or wrote has changed since. A range
 * read is guarded as a whole by one comparison, so the guards stay small
 * however many keys it returned.
 *
 * A scope goes through `begin` once and ends with either `commit` or `rollback`.
 */
export class DbTransaction {
  private stateValue: DbTransactionState = "idle";
  private base: number | null = null;
  private committed: number | null = null;
  private readonly buffer = new Map<string, Pending>();
  private readonly reads = new Map<string, Read>();
  private readonly ranges = new Map<string, RangeRead>();

  constructor(
    private readonly host: TransactionHost,
    private readonly opts: DbTransactionOpts = {},
  ) {}

  get state(): DbTransactionState {
    return this.stateValue;
  }

  get writable(): boolean {
    return this.opts.write ?? false;
  }

  /** The store revision this scope reads at. */
  get baseRevision(): number {
    if (this.base === null) {
      throw new ValidationError("Transaction has not begun");
    }

    return this.base;
  }

  /** The revision the commit produced. `null` before then, and for a commit with nothing to write. */
  get committedRevision(): number | null {
    return this.committed;
  }

  /** Number of buffered writes. */
  get pending(): number {
    return this.buffer.size;
  }

  /** Capture the base revision. Only ever once per scope. */
  async begin(): Promise<void> {
    if (this.stateValue !== "idle") {
      throw new ValidationError(`Cannot begin a transaction that is ${this.stateValue}`);
    }

    const status = await this.host.client.status(this.callOpts());

    this.base = status.header.revision;
    this.stateValue = "open";
  }

  /** The value of `key`, or `null` if it does not exist. */
  async get(key: Uint8Array): Promise<Uint8Array | null> {
    this.checkOpen();

    const pending = this.buffer.get(hex(key));

    if (pending !== undefined) {
      return pending.op === "put" ? pending.value : null;
    }

    const result = await this.host.client.get(key, {
      ...this.callOpts(),
      revision: this.baseRevision,
    });
    const kv = result.kvs[0];

    this.noteRead(key, kv === undefined ? 0 : kv.modRevision);

    return kv === undefined ? null : kv.value;
  }

  /**
   * Every pair with a key in `[start, end)`, in key order. An `end` of
   * {@linkcode OPEN_END} reads to the end of the keyspace.
   */
  async range(
    start: Uint8Array,
    end: Uint8Array,
    opts: { keysOnly?: boolean; limit?: number } = {},
  ): Promise<StoredPair[]> {
    this.checkOpen();

    const overlay = this.pendingWithin(start, end);
    const result = await this.host.client.get(keyRange(start, end), {
      ...this.callOpts(),
      revision: this.baseRevision,
      keysOnly: opts.keysOnly,
      // Buffered deletes may remove pairs, so only let the store cut short what the buffer leaves alone.
      limit: overlay.length === 0 ? opts.limit : undefined,
    });

    const pairs = new Map<string, StoredPair>();

    this.noteRange(start, end);

    for (const kv of result.kvs) {
      pairs.set(hex(kv.key), { key: kv.key, value: kv.value });
    }

    for (const pending of overlay) {
      if (pending.op === "put") {
        pairs.set(hex(pending.key), {
          key: pending.key,
          value: opts.keysOnly ? new Uint8Array() : pending.value,
        });
      } else {
        pairs.delete(hex(pending.key));
      }
    }

    const sorted = Array.from(pairs.values()).sort((a, b) =>
      compareBytes(a.key, b.key)
    );

    return opts.limit ? sorted.slice(0, opts.limit) : sorted;
  }

  /** Number of keys in `[start, end)`, including the scope's own writes. */
  async count(start: Uint8Array, end: Uint8Array): Promise<number> {
    this.checkOpen();

    if (this.pendingWithin(start, end).length > 0) {
      return (await this.range(start, end, { keysOnly: true })).length;
    }

    const result = await this.host.client.get(keyRange(start, end), {
      ...this.callOpts(),
      revision: this.baseRevision,
      countOnly: true,
    });

    this.noteRange(start, end);

    return result.count;
  }

  put(key: Uint8Array, value: Uint8Array) {
    this.checkWritable();

    this.buffer.set(hex(key), { op: "put", key, value });

    if (this.opts.stats) {
      this.opts.stats.puts += 1;
    }
  }

  delete(key: Uint8Array) {
    this.checkWritable();

    this.buffer.set(hex(key), { op: "delete", key });

    if (this.opts.stats) {
      this.opts.stats.deletes += 1;
    }
  }

  /** Throw unless the scope is open for writing. */
  checkWritable() {
    this.checkOpen();

    if (!this.writable) {
      throw new ValidationError("Transaction is read-only");
    }
  }

  /**
   * Send the buffered writes as one transaction. Nothing is sent if there are none.
   *
   * Throws a {@linkcode TransactionConflictError} if another writer got there first,
   * in which case nothing was applied.
   */
  async commit(): Promise<number | null> {
    this.checkOpen();

    const base = this.baseRevision;
    const writes = Array.from(this.buffer.values());
    let puts = 0;

    for (const pending of writes) {
      if (pending.op === "put") {
        puts += 1;
      }
    }

    if (writes.length === 0) {
      this.finish("committed");
      this.host.logger.debug(`Transaction at revision ${base} committed empty`);
      this.host.dispatchEvent(new TransactionCommitEvent(base, null, 0, 0));

      return null;
    }

    const guards = this.guards();

    let outcome: SubmitOutcome;

    try {
      outcome = await this.host.client.submit(
        transaction({
          compare: guards.map((guard) => guard.comparator),
          success: writes.map(toOperation),
          failure: guards.map((guard) => guard.check),
        }),
        this.callOpts(),
      );
    } catch (err) {
      this.abort(err);

      throw err;
    }

    if (!outcome.succeeded) {
      const moved: Uint8Array[] = [];

      const seen = new Set<string>();

      outcome.responses.forEach((response, i) => {
        for (const key of guards[i].moved(response)) {
          if (!seen.has(hex(key))) {
            seen.add(hex(key));
            moved.push(key);
          }
        }
      });

      const err = new TransactionConflictError(base, moved);

      this.abort(err);

      throw err;
    }

    this.committed = outcome.header.revision;
    this.finish("committed");

    this.host.logger.debug(
      `Transaction at revision ${base} committed ${writes.length} writes at revision ${this.committed}`,
    );
    this.host.dispatchEvent(
      new TransactionCommitEvent(base, this.committed, puts, writes.length - puts),
    );

    return this.committed;
  }

  /** Discard the buffered writes. The store is not contacted. */
  rollback(reason?: unknown) {
    this.checkOpen();
    this.abort(reason);
  }

  private abort(reason: unknown) {
    this.finish("rolledBack");

    this.host.logger.debug(
      `Transaction at revision ${this.baseRevision} rolled back`,
      reason,
    );
    this.host.dispatchEvent(new TransactionAbortEvent(this.baseRevision, reason));
  }

  private finish(state: "committed" | "rolledBack") {
    this.stateValue = state;
    this.buffer.clear();
  }

  /**
   * The comparisons the commit depends on: each point read unchanged, each
   * range read untouched since begin, and each blind write untouched since
   * begin.
   */
  private guards(): Guard[] {
    const base = this.baseRevision;
    const guards: Guard[] = [];

    for (const { start, end } of this.ranges.values()) {
      guards.push({
        comparator: compareModified(start, "<", base + 1, { rangeEnd: end }),
        check: opGet(keyRange(start, end), {
          keysOnly: true,
          minModRevision: base + 1,
        }),
        moved: (response) => response.kind === "range" ? response.kvs.map((kv) => kv.key) : [],
      });
    }

    for (const read of this.reads.values()) {
      guards.push({
        comparator: compareModified(read.key, "==", read.modRevision),
        check: opGet(read.key, { keysOnly: true }),
        moved: (response) =>
          modRevisionOf(response) === read.modRevision ? [] : [read.key],
      });
    }

    for (const [id, pending] of this.buffer) {
      if (!this.reads.has(id) && !this.inReadRange(pending.key)) {
        guards.push({
          comparator: compareModified(pending.key, "<", base + 1),
          check: opGet(pending.key, { keysOnly: true }),
          moved: (response) =>
            modRevisionOf(response) < base + 1 ? [] : [pending.key],
        });
      }
    }

    return guards;
  }

  private noteRead(key: Uint8Array, modRevision: number) {
    const id = hex(key);

    // The first observation is the one the scope's view is based on.
    if (!this.reads.has(id)) {
      this.reads.set(id, { key, modRevision });
    }
  }

  private noteRange(start: Uint8Array, end: Uint8Array) {
    this.ranges.set(`${hex(start)}:${hex(end)}`, { start, end });
  }

  private inReadRange(key: Uint8Array): boolean {
    for (const { start, end } of this.ranges.values()) {
      if (withinRange(key, start, end)) {
        return true;
      }
    }

    return false;
  }

  private pendingWithin(start: Uint8Array, end: Uint8Array): Pending[] {
    return Array.from(this.buffer.values()).filter((pending) =>
      withinRange(pending.key, start, end)
    );
  }

  private checkOpen() {
    if (this.stateValue !== "open") {
      throw new ValidationError(
        this.stateValue === "idle"
          ? "Transaction has not begun"
          : `Transaction is already ${this.stateValue}`,
      );
    }
  }

  private callOpts(): { timeout?: number } {
    return this.opts.timeout === undefined ? {} : { timeout: this.opts.timeout };
  }

  toString(): string {
    return `DbTransaction(${this.stateValue}, base=${this.base}, pending=${this.buffer.size})`;
  }
}

function toOperation(pending: Pending): Operation {
  return pending.op === "put"
    ? opSet(pending.key, pending.value)
    : opDelete(single(pending.key));
}

function keyRange(start: Uint8Array, end: Uint8Array) {
  return isOpenEnd(end) ? fromKey(start) : range(start, end);
}

function withinRange(key: Uint8Array, start: Uint8Array, end: Uint8Array): boolean {
  return compareBytes(key, start) >= 0 &&
    (isOpenEnd(end) || compareBytes(key, end) < 0);
}

function modRevisionOf(response: TxnResponse): number {
  return response.kind === "range" && response.kvs.length > 0
    ? response.kvs[0].modRevision
    : 0;
}

function isOpenEnd(end: Uint8Array): boolean {
  return compareBytes(end, OPEN_END) === 0;
}

function hex(key: Uint8Array): string {
  return toString(key, "base16");
}
