import { type ClientOpts, resolveClientOpts, type ResolvedClientOpts } from "./config.ts";
import { ValidationError } from "./errors.ts";
import { type KeyArg, toKeyRange } from "./key_range.ts";
import { type GatewayCaller, Lease } from "./lease.ts";
import type { Logger, Observability } from "./observability.ts";
import {
  checkGetOpts,
  marshalTransaction,
  type SubmitOutcome,
  type Transaction,
} from "./transaction.ts";
import type {
  CallOpts,
  Deleted,
  GetOpts,
  Range,
  Revision,
  Status,
} from "./types.ts";
import { assertBytes } from "./util/bytes.ts";
import { Watch, type WatchCallback, type WatchOpts } from "./watch/watch.ts";
import {
  decodeDeleted,
  decodeLeaseGrant,
  decodeRange,
  decodeRevision,
  decodeStatus,
  decodeTxn,
} from "./wire/decode.ts";
import {
  marshalDeleteRange,
  marshalLeaseGrant,
  marshalPut,
  marshalRange,
  marshalWatchCreate,
} from "./wire/encode.ts";
import { type Endpoint, Endpoints } from "./wire/endpoints.ts";

export type SetOpts = CallOpts & {
  /** Attach the key to a lease, deleting it when the lease ends. */
  lease?: Lease | bigint;
  returnPrevious?: boolean;
};

export type DeleteOpts = CallOpts & {
  returnPrevious?: boolean;
};

/**
 * A client for the JSON gateway of the store. Every method is a single
 * independent request, except {@linkcode watch} which holds a stream open.
 *
 * ```ts
 * const client = new Client({ url: "http://localhost:2379" });
 *
 * await client.set(key, value);
 * const { kvs } = await client.get(prefix(key));
 * ```
 */
export class Client implements GatewayCaller {
  private readonly opts: ResolvedClientOpts;

  constructor(opts: ClientOpts = {}) {
    this.opts = resolveClientOpts(opts);
  }

  get url(): string {
    return this.opts.url;
  }

  get observability(): Observability {
    return this.opts.observability;
  }

  private get logger(): Logger {
    return this.opts.observability.logger;
  }

  /** POST `body` to an endpoint and return the undecoded response. */
  async call(
    endpoint: Endpoint,
    body: unknown,
    opts: CallOpts = {},
  ): Promise<unknown> {
    const timeout = opts.timeout ?? this.opts.timeout;

    if (timeout !== null && !(Number.isFinite(timeout) && timeout > 0)) {
      throw new ValidationError(
        `timeout must be a positive number of milliseconds, not ${timeout}`,
      );
    }

    return await this.opts.transport.request(this.path(endpoint), body, {
      signal: timeout === null ? undefined : AbortSignal.timeout(timeout),
    });
  }

  /** Status of the cluster member the gateway talks to. */
  async status(opts: CallOpts = {}): Promise<Status> {
    this.opts.observability.stats.increment("status");

    return decodeStatus(await this.call(Endpoints.Status, {}, opts));
  }

  /** Set the value of a key. Every set increments the store's revision. */
  async set(
    key: Uint8Array,
    value: Uint8Array,
    opts: SetOpts = {},
  ): Promise<Revision> {
    assertBytes(key, "key");
    assertBytes(value, "value");

    const lease = leaseIdOf(opts.lease);

    this.opts.observability.stats.increment("set");

    return decodeRevision(
      await this.call(
        Endpoints.Put,
        marshalPut(key, value, { lease, prevKv: opts.returnPrevious }),
        opts,
      ),
    );
  }

  /** Read a key, or every key in a range. */
  async get(keys: KeyArg, opts: GetOpts & CallOpts = {}): Promise<Range> {
    const range = toKeyRange(keys);

    checkGetOpts(opts);
    this.opts.observability.stats.increment("get");

    return decodeRange(
      await this.call(Endpoints.Range, marshalRange(range, opts), opts),
    );
  }

  /** Delete a key, or every key in a range. */
  async delete(keys: KeyArg, opts: DeleteOpts = {}): Promise<Deleted> {
    const range = toKeyRange(keys);

    this.opts.observability.stats.increment("delete");

    return decodeDeleted(
      await this.call(
        Endpoints.DeleteRange,
        marshalDeleteRange(range, { prevKv: opts.returnPrevious }),
        opts,
      ),
    );
  }

  /**
   * Submit a transaction: if every comparator holds the store executes the
   * success branch, otherwise the failure branch, atomically and at a single revision.
   *
   * Which branch ran is in the outcome's `succeeded`. Use {@linkcode assertSucceeded}
   * to turn a failed compare into an exception.
   */
  async submit(txn: Transaction, opts: CallOpts = {}): Promise<SubmitOutcome> {
    this.opts.observability.stats.increment("submit");

    const result = decodeTxn(
      await this.call(Endpoints.Txn, marshalTransaction(txn), opts),
    );

    if (result.succeeded) {
      return { succeeded: true, header: result.header, responses: result.responses };
    }

    return { succeeded: false, header: result.header, responses: result.responses };
  }

  /** Grant a lease of `ttl` seconds. The store picks the id unless one is given. */
  async lease(
    ttl: number,
    leaseId?: bigint,
    opts: CallOpts = {},
  ): Promise<Lease> {
    if (!Number.isSafeInteger(ttl) || ttl < 1) {
      throw new ValidationError(
        `time to live must be a positive integer of seconds, not ${ttl}`,
      );
    }

    if (leaseId !== undefined && leaseId < BigInt(0)) {
      throw new ValidationError(`lease id must not be negative, not ${leaseId}`);
    }

    this.opts.observability.stats.increment("lease");

    const granted = decodeLeaseGrant(
      await this.call(Endpoints.LeaseGrant, marshalLeaseGrant(ttl, leaseId), opts),
    );

    return new Lease(this, granted.id, granted.ttl, granted.header);
  }

  /**
   * Watch one or more keys or ranges and call `callback` for every change.
   *
   * Resolves once the store has confirmed the watch. The watch runs until
   * {@linkcode Watch.cancel} is called or the stream ends; {@linkcode Watch.closed}
   * tells which.
   */
  async watch(
    keys: KeyArg[],
    callback: WatchCallback,
    opts: WatchOpts = {},
  ): Promise<Watch> {
    if (keys.length === 0) {
      throw new ValidationError("watch needs at least one key or range");
    }

    if (
      opts.startRevision !== undefined &&
      (!Number.isSafeInteger(opts.startRevision) || opts.startRevision < 0)
    ) {
      throw new ValidationError(
        `startRevision must be a non-negative integer, not ${opts.startRevision}`,
      );
    }

    const requests = keys.map((arg) =>
      marshalWatchCreate(toKeyRange(arg), {
        startRevision: opts.startRevision,
        prevKv: opts.prevKv,
        filters: opts.filters,
        progressNotify: opts.progressNotify,
      })
    );

    const watch = new Watch(
      this.opts.transport,
      this.path(Endpoints.Watch),
      requests,
      callback,
      this.logger,
      { highWaterMark: opts.highWaterMark },
    );

    this.opts.observability.stats.increment("watch");

    await watch.start();

    return watch;
  }

  private path(endpoint: Endpoint): string {
    return `${this.opts.apiPrefix}/${endpoint}`;
  }
}

function leaseIdOf(lease: Lease | bigint | undefined): bigint | undefined {
  if (lease === undefined || typeof lease === "bigint") {
    return lease;
  }

  if (lease.expired) {
    throw new ValidationError(`Cannot attach a key to expired ${lease}`);
  }

  return lease.leaseId;
}
