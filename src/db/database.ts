import type { Client } from "../client.ts";
import { ValidationError } from "../errors.ts";
import type { ClientOperation, Logger } from "../observability.ts";
import type { CallOpts, Status } from "../types.ts";
import type { PersistentMap } from "./pmap.ts";
import { lowestFreeSlot, readSlots, type Slot, writeSlot } from "./slot.ts";
import {
  DbTransaction,
  type DbTransactionOpts,
  type TransactionHost,
} from "./transaction.ts";

export type DatabaseOpts = {
  /** Refuse write transactions. */
  readOnly?: boolean;
};

export type AttachSlotOpts = {
  /** Register a new slot if `oid` has none. */
  create?: boolean;
  name?: string;
  description?: string;
  tags?: string[];
  creator?: string;
};

/**
 * Typed persistent maps on top of a {@linkcode Client}, read and written through
 * optimistic transactions.
 *
 * Dispatches {@linkcode TransactionCommitEvent} and {@linkcode TransactionAbortEvent}
 * for every transaction it begins.
 */
export class Database extends EventTarget implements TransactionHost {
  readonly readOnly: boolean;

  constructor(readonly client: Client, opts: DatabaseOpts = {}) {
    super();

    this.readOnly = opts.readOnly ?? false;
  }

  get logger(): Logger {
    return this.client.observability.logger;
  }

  /** Open a transaction scope. End it with `commit` or `rollback`, or use {@linkcode run}. */
  async begin(opts: DbTransactionOpts = {}): Promise<DbTransaction> {
    if (opts.write && this.readOnly) {
      throw new ValidationError("Database is read-only");
    }

    const txn = new DbTransaction(this, opts);

    await txn.begin();

    return txn;
  }

  /**
   * Run `fn` in a transaction scope. The scope commits when `fn` returns and rolls
   * back when it throws, after which the error is rethrown.
   */
  async run<T>(
    fn: (txn: DbTransaction) => Promise<T>,
    opts: DbTransactionOpts = {},
  ): Promise<T> {
    const txn = await this.begin(opts);

    let result: T;

    try {
      result = await fn(txn);
    } catch (err) {
      if (txn.state === "open") {
        txn.rollback(err);
      }

      throw err;
    }

    if (txn.state === "open") {
      await txn.commit();
    }

    return result;
  }

  status(opts: CallOpts = {}): Promise<Status> {
    return this.client.status(opts);
  }

  stats(): Record<ClientOperation, number> {
    return this.client.observability.stats.marshal();
  }

  /** Every slot registered in the slot table. */
  slots(): Promise<Slot[]> {
    return this.run(readSlots);
  }

  /**
   * The map registered for `oid`, built by `make` from its slot index.
   *
   * With `create`, an `oid` without a slot gets the lowest free one.
   */
  async attachSlot<K, V>(
    oid: string,
    make: (slot: number) => PersistentMap<K, V>,
    opts: AttachSlotOpts = {},
  ): Promise<PersistentMap<K, V>> {
    const slot = await this.run(async (txn) => {
      const slots = await readSlots(txn);
      const existing = slots.find((entry) => entry.oid === oid);

      if (existing !== undefined) {
        return existing;
      }

      if (!opts.create) {
        throw new ValidationError(`No slot is registered for ${oid}`);
      }

      const free = lowestFreeSlot(slots);

      if (free === null) {
        throw new ValidationError("Every slot is taken");
      }

      const created: Slot = {
        oid,
        slot: free,
        name: opts.name ?? null,
        description: opts.description ?? null,
        tags: opts.tags ?? [],
        creator: opts.creator ?? null,
      };

      writeSlot(txn, created);
      this.logger.info(`Registered slot ${free} for ${oid}`);

      return created;
    }, { write: !!opts.create && !this.readOnly });

    return make(slot.slot);
  }
}
