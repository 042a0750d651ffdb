import { concat } from "uint8arrays";
import type { Client } from "../client.ts";
import { ValidationError } from "../errors.ts";
import { range } from "../key_range.ts";
import type { WatchEvent } from "../types.ts";
import { compareBytes, prefixEnd, uint16ToBytes } from "../util/bytes.ts";
import type { Watch, WatchOpts } from "../watch/watch.ts";
import type { KeyCodec } from "./key_codecs.ts";
import { checkSlot } from "./slot.ts";
import type { DbTransaction } from "./transaction.ts";
import { type Compression, compressed, type ValueCodec } from "./value_codecs.ts";

export type PersistentMapOpts = {
  compress?: Compression;
};

export type SelectOpts<K> = {
  /** Inclusive. The start of the map when unset. */
  from?: K;
  /** Exclusive. The end of the map when unset. */
  to?: K;
  limit?: number;
};

/** Receives a changed entry. `value` is `null` when the entry was deleted. */
export type MapWatchCallback<K, V> = (
  key: K,
  value: V | null,
  event: WatchEvent,
) => void | Promise<void>;

export type MapWatchOpts<K> =
  & Pick<SelectOpts<K>, "from" | "to">
  & Pick<WatchOpts, "startRevision" | "highWaterMark">;

/** What a map needs to maintain an index, whatever the index's own key type. */
interface AttachedIndex<V, K> {
  readonly name: string;
  entryKey(value: V): Uint8Array;
  entryValue(key: K): Uint8Array;
  clear(txn: DbTransaction): Promise<number>;
}

/**
 * A secondary index: maps `derive(value)` to the primary key in another {@linkcode PersistentMap}.
 *
 * Entries are written and removed by the primary map, in the same transaction as the entry they
 * derive from.
 */
export class Index<V, IK, K> implements AttachedIndex<V, K> {
  constructor(
    readonly name: string,
    readonly derive: (value: V) => IK,
    readonly target: PersistentMap<IK, K>,
  ) {}

  entryKey(value: V): Uint8Array {
    return this.target.physicalKey(this.derive(value));
  }

  entryValue(key: K): Uint8Array {
    return this.target.encodeValue(key);
  }

  clear(txn: DbTransaction): Promise<number> {
    return this.target.truncate(txn, { rebuildIndexes: false });
  }
}

/**
 * A typed map stored under a two byte slot prefix in the store's flat keyspace:
 * the key of every entry is `uint16be(slot) ++ keyCodec.encode(key)`.
 *
 * All reads and writes go through a {@linkcode DbTransaction}.
 *
 * ```ts
 * const users = new PersistentMap(10, uuidKeys, jsonValues({ marshal, unmarshal }));
 * const byName = new PersistentMap(11, stringKeys, uuidValues);
 *
 * users.attachIndex("name", (user) => user.name, byName);
 *
 * await db.run(async (txn) => {
 *   await users.put(txn, user.oid, user);
 * }, { write: true });
 * ```
 */
export class PersistentMap<K, V> {
  readonly slotPrefix: Uint8Array;
  private readonly values: ValueCodec<V>;
  private readonly indexes = new Map<string, AttachedIndex<V, K>>();

  constructor(
    readonly slot: number,
    readonly keyCodec: KeyCodec<K>,
    readonly valueCodec: ValueCodec<V>,
    opts: PersistentMapOpts = {},
  ) {
    this.slotPrefix = uint16ToBytes(checkSlot(slot));
    this.values = opts.compress === undefined
      ? valueCodec
      : compressed(valueCodec, opts.compress);
  }

  /** The key an entry for `key` is stored under. */
  physicalKey(key: K): Uint8Array {
    return concat([this.slotPrefix, this.keyCodec.encode(key)]);
  }

  encodeValue(value: V): Uint8Array {
    return this.values.encode(value);
  }

  decodeValue(bytes: Uint8Array): V {
    return this.values.decode(bytes);
  }

  async get(txn: DbTransaction, key: K): Promise<V | null> {
    const data = await txn.get(this.physicalKey(key));

    return data === null ? null : this.decodeValue(data);
  }

  /** Set `key` to `value`, replacing the index entries derived from the previous value. */
  async put(txn: DbTransaction, key: K, value: V): Promise<void> {
    txn.checkWritable();

    const physical = this.physicalKey(key);
    const data = this.encodeValue(value);
    const previous = this.indexes.size > 0 ? await this.get(txn, key) : null;

    txn.put(physical, data);

    for (const index of this.indexes.values()) {
      const entryKey = index.entryKey(value);

      if (previous !== null) {
        const staleKey = index.entryKey(previous);

        if (compareBytes(staleKey, entryKey) !== 0) {
          txn.delete(staleKey);
        }
      }

      txn.put(entryKey, index.entryValue(key));
    }
  }

  /** Remove `key` and the index entries derived from its value. */
  async delete(txn: DbTransaction, key: K): Promise<void> {
    txn.checkWritable();

    const previous = this.indexes.size > 0 ? await this.get(txn, key) : null;

    txn.delete(this.physicalKey(key));

    if (previous === null) {
      return;
    }

    for (const index of this.indexes.values()) {
      txn.delete(index.entryKey(previous));
    }
  }

  /** Keys in order, from `opts.from` up to but excluding `opts.to`. */
  select(
    txn: DbTransaction,
    opts: SelectOpts<K> & { returnKeys: true; returnValues: false },
  ): Promise<K[]>;
  /** Key-value pairs in key order. */
  select(
    txn: DbTransaction,
    opts: SelectOpts<K> & { returnKeys: true; returnValues?: true },
  ): Promise<[K, V][]>;
  /** Values in key order. */
  select(
    txn: DbTransaction,
    opts?: SelectOpts<K> & { returnKeys?: false; returnValues?: true },
  ): Promise<V[]>;
  async select(
    txn: DbTransaction,
    opts: SelectOpts<K> & { returnKeys?: boolean; returnValues?: boolean } = {},
  ): Promise<K[] | [K, V][] | V[]> {
    const returnKeys = opts.returnKeys ?? false;
    const returnValues = opts.returnValues ?? true;

    if (!returnKeys && !returnValues) {
      throw new ValidationError("select must return keys, values or both");
    }

    const pairs = await txn.range(
      opts.from === undefined ? this.slotPrefix : this.physicalKey(opts.from),
      opts.to === undefined ? this.slotEnd() : this.physicalKey(opts.to),
      { keysOnly: !returnValues, limit: opts.limit },
    );

    if (!returnValues) {
      return pairs.map((pair) => this.decodeKey(pair.key));
    }

    if (!returnKeys) {
      return pairs.map((pair) => this.decodeValue(pair.value));
    }

    return pairs.map((pair): [K, V] => [
      this.decodeKey(pair.key),
      this.decodeValue(pair.value),
    ]);
  }

  /** Number of entries, or of entries whose encoded key starts with the encoding of `prefix`. */
  count(txn: DbTransaction, prefix?: K): Promise<number> {
    if (prefix === undefined) {
      return txn.count(this.slotPrefix, this.slotEnd());
    }

    const start = this.physicalKey(prefix);

    return txn.count(start, prefixEnd(start));
  }

  /**
   * Delete every entry. With `rebuildIndexes` (the default) the attached indexes are
   * rebuilt afterwards, which empties them too.
   *
   * Returns the number of entries deleted, index entries included.
   */
  async truncate(
    txn: DbTransaction,
    opts: { rebuildIndexes?: boolean } = {},
  ): Promise<number> {
    txn.checkWritable();

    const pairs = await txn.range(this.slotPrefix, this.slotEnd(), {
      keysOnly: true,
    });

    for (const pair of pairs) {
      txn.delete(pair.key);
    }

    let deleted = pairs.length;

    if (opts.rebuildIndexes ?? true) {
      deleted += (await this.rebuildIndexes(txn)).deleted;
    }

    return deleted;
  }

  /**
   * Follow changes to the entries from `opts.from` up to but excluding `opts.to`,
   * outside of any transaction. Resolves once the store has confirmed the watch.
   */
  watch(
    client: Client,
    callback: MapWatchCallback<K, V>,
    opts: MapWatchOpts<K> = {},
  ): Promise<Watch> {
    const keys = range(
      opts.from === undefined ? this.slotPrefix : this.physicalKey(opts.from),
      opts.to === undefined ? this.slotEnd() : this.physicalKey(opts.to),
    );

    return client.watch(
      [keys],
      (kv, event) =>
        callback(
          this.decodeKey(kv.key),
          event.type === "delete" ? null : this.decodeValue(kv.value),
          event,
        ),
      { startRevision: opts.startRevision, highWaterMark: opts.highWaterMark },
    );
  }

  /**
   * Attach an index kept up to date by every later `put` and `delete`.
   *
   * Entries already in the map are not indexed until {@linkcode rebuildIndex} is called.
   */
  attachIndex<IK>(
    name: string,
    derive: (value: V) => IK,
    target: PersistentMap<IK, K>,
  ): Index<V, IK, K> {
    if (this.indexes.has(name)) {
      throw new ValidationError(`${this} already has an index named "${name}"`);
    }

    if (target.slot === this.slot) {
      throw new ValidationError(`${this} cannot index into its own slot`);
    }

    const index = new Index(name, derive, target);

    this.indexes.set(name, index);

    return index;
  }

  /** Returns whether the index was attached. */
  detachIndex(index: { name: string } | string): boolean {
    return this.indexes.delete(typeof index === "string" ? index : index.name);
  }

  get indexNames(): string[] {
    return Array.from(this.indexes.keys());
  }

  /** Empty the index's map and fill it again from every entry of this one. */
  async rebuildIndex(
    txn: DbTransaction,
    index: { name: string } | string,
  ): Promise<{ deleted: number; inserted: number }> {
    const name = typeof index === "string" ? index : index.name;
    const attached = this.indexes.get(name);

    if (attached === undefined) {
      throw new ValidationError(`${this} has no index named "${name}"`);
    }

    const deleted = await attached.clear(txn);
    const entries = await this.select(txn, { returnKeys: true });

    for (const [key, value] of entries) {
      txn.put(attached.entryKey(value), attached.entryValue(key));
    }

    return { deleted, inserted: entries.length };
  }

  async rebuildIndexes(
    txn: DbTransaction,
  ): Promise<{ deleted: number; inserted: number }> {
    const total = { deleted: 0, inserted: 0 };

    for (const name of this.indexes.keys()) {
      const counts = await this.rebuildIndex(txn, name);

      total.deleted += counts.deleted;
      total.inserted += counts.inserted;
    }

    return total;
  }

  toString(): string {
    return `PersistentMap(slot=${this.slot}, ${this.keyCodec.name} -> ${this.values.name})`;
  }

  private decodeKey(physical: Uint8Array): K {
    return this.keyCodec.decode(physical.subarray(this.slotPrefix.byteLength));
  }

  private slotEnd(): Uint8Array {
    return prefixEnd(this.slotPrefix);
  }
}
