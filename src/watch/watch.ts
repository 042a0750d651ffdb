import { type Pushable, pushable } from "it-pushable";
import pDefer from "p-defer";
import { toString } from "uint8arrays";
import { ValidationError, WatchClosedError } from "../errors.ts";
import type { Logger } from "../observability.ts";
import type { Transport } from "../transport/types.ts";
import type { KeyValue, WatchEvent, WatchFilter } from "../types.ts";
import { displayBytes } from "../util/bytes.ts";
import { decodeWatchMessage, type WatchMessage } from "../wire/decode.ts";
import type { WatchCreateRequest } from "../wire/encode.ts";
import { splitLines } from "./line_splitter.ts";

export type WatchState =
  | "idle"
  | "requesting"
  | "streaming"
  | "cancelled"
  | "closed"
  | "errored";

/** Invoked once per change, in the order the store reports them. May be async: the next event waits for it. */
export type WatchCallback = (
  kv: KeyValue,
  event: WatchEvent,
) => void | Promise<void>;

export type WatchOpts = {
  /** Revision to replay history from, inclusive. Only new changes when unset. */
  startRevision?: number;
  /** Ask for the previous key-value with every event. */
  prevKv?: boolean;
  filters?: WatchFilter[];
  progressNotify?: boolean;
  /** Stop reading from the stream while this many events wait for the callback. Defaults to 100. */
  highWaterMark?: number;
};

export const DEFAULT_HIGH_WATER_MARK = 100;

/**
 * A long-lived stream of change events over one or more key ranges.
 *
 * Reading and delivering are separate tasks joined by a bounded queue: the
 * reader decodes lines into events and queues them, the consumer hands them to
 * the callback one by one.
 */
export class Watch {
  private stateValue: WatchState = "idle";
  private readonly abort = new AbortController();
  private readonly queue: Pushable<WatchEvent>;
  private readonly ready = pDefer<void>();
  private readonly stopped = pDefer<void>();
  private readonly highWaterMark: number;
  private readonly ids: number[] = [];
  private failure: WatchClosedError | null = null;
  private drained: Promise<void> | null = null;
  private reading: Promise<void> | null = null;
  private closedPromise: Promise<void> | null = null;

  constructor(
    private readonly transport: Transport,
    private readonly path: string,
    private readonly requests: WatchCreateRequest[],
    private readonly callback: WatchCallback,
    private readonly logger: Logger,
    opts: { highWaterMark?: number } = {},
  ) {
    const highWaterMark = opts.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;

    if (!Number.isSafeInteger(highWaterMark) || highWaterMark < 1) {
      throw new ValidationError(
        `highWaterMark must be a positive integer, not ${highWaterMark}`,
      );
    }

    this.highWaterMark = highWaterMark;
    this.queue = pushable<WatchEvent>({ objectMode: true });
  }

  get state(): WatchState {
    return this.stateValue;
  }

  /** The ids the store assigned, one per watched range, once confirmed. */
  get watchIds(): number[] {
    return [...this.ids];
  }

  /** Events decoded but not yet handed to the callback. */
  get pending(): number {
    return this.queue.readableLength;
  }

  /**
   * Settles once the watch has stopped and every event it will deliver has been delivered.
   *
   * Resolves after {@linkcode cancel}, rejects with a {@linkcode WatchClosedError} if the
   * stream ended any other way. Stays pending until then, even if read before {@linkcode start}.
   */
  get closed(): Promise<void> {
    if (this.closedPromise === null) {
      this.closedPromise = this.stopped.promise
        .then(() => Promise.all([this.reading, this.drained]))
        .then(() => {
          if (this.failure !== null) {
            throw this.failure;
          }
        });
    }

    return this.closedPromise;
  }

  /**
   * Open the stream and wait until the store has confirmed every range.
   *
   * Rejects if the stream cannot be opened or ends before that.
   */
  async start(): Promise<void> {
    if (this.stateValue !== "idle") {
      throw new ValidationError(`Cannot start a watch that is ${this.stateValue}`);
    }

    this.stateValue = "requesting";
    this.drained = this.consume();

    let body: AsyncIterable<Uint8Array>;

    try {
      body = await this.transport.stream(this.path, this.requests, {
        signal: this.abort.signal,
      });
    } catch (err) {
      if (this.is("cancelled")) {
        return;
      }

      throw this.terminate(
        "errored",
        new WatchClosedError("Opening the watch stream failed", { cause: err }),
      );
    }

    if (this.is("cancelled")) {
      return;
    }

    this.stateValue = "streaming";
    this.reading = this.read(body);

    await this.ready.promise;

    if (this.failure !== null) {
      throw this.failure;
    }
  }

  /** Stop watching. Events still queued are dropped. Safe to call more than once, and at any time. */
  cancel(): void {
    if (this.isTerminal()) {
      return;
    }

    this.stateValue = "cancelled";
    this.abort.abort();
    this.queue.end();
    this.ready.resolve();
    this.stopped.resolve();

    this.logger.debug(`Watch ${this.ids.join(",")} cancelled`);
  }

  /** The reader: turns stream lines into queued events. Never rejects. */
  private async read(body: AsyncIterable<Uint8Array>): Promise<void> {
    try {
      for await (const line of splitLines(body)) {
        const message = this.parse(line);

        if (message === null) {
          continue;
        }

        if (message.created) {
          this.ids.push(message.watchId);

          if (this.ids.length >= this.requests.length) {
            this.ready.resolve();
          }
        }

        if (message.canceled) {
          this.terminate(
            "closed",
            new WatchClosedError(
              `Watch ${message.watchId} was cancelled by the store: ${
                message.cancelReason || "no reason given"
              }`,
            ),
          );
          this.abort.abort();

          return;
        }

        for (const event of message.events) {
          if (this.isTerminal()) {
            return;
          }

          this.queue.push(event);

          if (this.queue.readableLength >= this.highWaterMark) {
            await this.queue.onEmpty({ signal: this.abort.signal });
          }
        }
      }

      this.terminate(
        "closed",
        new WatchClosedError("Watch stream closed by the store"),
      );
    } catch (err) {
      // The abort of a cancelled watch surfaces here, and is not an error.
      if (this.isTerminal()) {
        return;
      }

      this.terminate(
        "errored",
        new WatchClosedError("Watch stream failed", { cause: err }),
      );
    }
  }

  /** The consumer: hands queued events to the callback. Never rejects. */
  private async consume(): Promise<void> {
    for await (const event of this.queue) {
      if (this.is("cancelled")) {
        break;
      }

      try {
        await this.callback(event.kv, event);
      } catch (err) {
        this.logger.warn(
          `Watch callback failed on ${event.type} of ${displayBytes(event.kv.key)}`,
          err,
        );
      }
    }
  }

  private parse(line: Uint8Array): WatchMessage | null {
    try {
      return decodeWatchMessage(JSON.parse(toString(line, "utf8")));
    } catch (err) {
      this.logger.warn(
        `Skipping malformed watch message ${JSON.stringify(toString(line, "utf8"))}`,
        err,
      );

      return null;
    }
  }

  private terminate(
    state: "closed" | "errored",
    failure: WatchClosedError,
  ): WatchClosedError {
    if (!this.isTerminal()) {
      this.stateValue = state;
      this.failure = failure;
      this.queue.end();
      this.ready.resolve();
      this.stopped.resolve();

      if (failure.cause === undefined) {
        this.logger.warn(failure.message);
      } else {
        this.logger.warn(failure.message, failure.cause);
      }
    }

    return failure;
  }

  private is(state: WatchState): boolean {
    return this.stateValue === state;
  }

  private isTerminal(): boolean {
    return this.is("cancelled") || this.is("closed") || this.is("errored");
  }
}
