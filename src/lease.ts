import { LeaseExpiredError, StoreError } from "./errors.ts";
import type { CallOpts, Header } from "./types.ts";
import {
  decodeHeaderOnly,
  decodeLeaseKeepAlive,
  decodeLeaseTimeToLive,
} from "./wire/decode.ts";
import { marshalLeaseId, marshalLeaseTimeToLive } from "./wire/encode.ts";
import { type Endpoint, Endpoints } from "./wire/endpoints.ts";

/** What a lease needs from the client that granted it. */
export interface GatewayCaller {
  call(endpoint: Endpoint, body: unknown, opts?: CallOpts): Promise<unknown>;
}

/** The store's "lease not found" code. */
const NOT_FOUND = 5;

/**
 * A TTL-bound handle granted by the store. Keys attached to it are deleted when it runs out or is revoked.
 *
 * Once any call has found the lease gone, the lease is expired for good and every further call
 * throws a {@linkcode LeaseExpiredError} without asking the store.
 */
export class Lease {
  private isExpired = false;

  constructor(
    private readonly caller: GatewayCaller,
    readonly leaseId: bigint,
    /** The TTL the store granted, in seconds. */
    readonly timeToLive: number,
    readonly header: Header,
  ) {}

  get expired(): boolean {
    return this.isExpired;
  }

  /** Seconds left before the lease runs out. */
  async remaining(opts: CallOpts = {}): Promise<number> {
    this.checkExpired();

    const response = decodeLeaseTimeToLive(
      await this.caller.call(
        Endpoints.LeaseTimeToLive,
        marshalLeaseTimeToLive(this.leaseId),
        opts,
      ),
    );

    return this.checkTtl(response.ttl);
  }

  /** The keys currently attached to the lease. */
  async keys(opts: CallOpts = {}): Promise<Uint8Array[]> {
    this.checkExpired();

    const response = decodeLeaseTimeToLive(
      await this.caller.call(
        Endpoints.LeaseTimeToLive,
        marshalLeaseTimeToLive(this.leaseId, { keys: true }),
        opts,
      ),
    );

    this.checkTtl(response.ttl);

    return response.keys;
  }

  /** Reset the countdown to the granted TTL. Scheduling refreshes is up to the caller. */
  async refresh(opts: CallOpts = {}): Promise<Header> {
    this.checkExpired();

    const response = decodeLeaseKeepAlive(
      await this.caller.call(
        Endpoints.LeaseKeepAlive,
        marshalLeaseId(this.leaseId),
        opts,
      ),
    );

    this.checkTtl(response.ttl);

    return response.header;
  }

  /** End the lease now. The store deletes every attached key. */
  async revoke(opts: CallOpts = {}): Promise<Header> {
    this.checkExpired();

    try {
      const header = decodeHeaderOnly(
        await this.caller.call(
          Endpoints.LeaseRevoke,
          marshalLeaseId(this.leaseId),
          opts,
        ),
      );

      this.isExpired = true;

      return header;
    } catch (err) {
      if (err instanceof StoreError && err.code === NOT_FOUND) {
        this.isExpired = true;

        throw new LeaseExpiredError(this.leaseId);
      }

      throw err;
    }
  }

  toString(): string {
    return `Lease(${this.leaseId}, ttl=${this.timeToLive}, expired=${this.isExpired})`;
  }

  private checkExpired() {
    if (this.isExpired) {
      throw new LeaseExpiredError(this.leaseId);
    }
  }

  /** The store reports a gone lease with a missing, zero or negative TTL. */
  private checkTtl(ttl: number): number {
    if (ttl <= 0) {
      this.isExpired = true;

      throw new LeaseExpiredError(this.leaseId);
    }

    return ttl;
  }
}
