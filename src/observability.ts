/** Where the client reports what it cannot throw: failing watch callbacks, dropped stream lines, commits. */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Writes to the console. */
export const consoleLogger: Logger = {
  debug: (message, ...args) => console.debug(message, ...args),
  info: (message, ...args) => console.info(message, ...args),
  warn: (message, ...args) => console.warn(message, ...args),
  error: (message, ...args) => console.error(message, ...args),
};

function ignore() {}

/** Discards everything. */
export const silentLogger: Logger = {
  debug: ignore,
  info: ignore,
  warn: ignore,
  error: ignore,
};

export type ClientOperation =
  | "status"
  | "get"
  | "set"
  | "delete"
  | "submit"
  | "lease"
  | "watch";

/** Counts the calls a client has issued, per operation. */
export class ClientStats {
  private counts: Record<ClientOperation, number> = {
    status: 0,
    get: 0,
    set: 0,
    delete: 0,
    submit: 0,
    lease: 0,
    watch: 0,
  };

  increment(operation: ClientOperation) {
    this.counts[operation] += 1;
  }

  count(operation: ClientOperation): number {
    return this.counts[operation];
  }

  marshal(): Record<ClientOperation, number> {
    return { ...this.counts };
  }
}

/** Passed explicitly to whatever logs or counts, rather than reached for globally. */
export type Observability = {
  logger: Logger;
  stats: ClientStats;
};

export function createObservability(
  opts: { logger?: Logger; stats?: ClientStats } = {},
): Observability {
  return {
    logger: opts.logger ?? consoleLogger,
    stats: opts.stats ?? new ClientStats(),
  };
}
