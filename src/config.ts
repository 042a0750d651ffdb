import { ValidationError } from "./errors.ts";
import { createObservability, type Observability } from "./observability.ts";
import { TransportHttp } from "./transport/http.ts";
import type { Transport } from "./transport/types.ts";

export const DEFAULT_URL = "http://localhost:2379";
export const DEFAULT_API_PREFIX = "/v3";

export type ClientOpts = {
  /** Base URL of the gateway. Defaults to `http://localhost:2379`. */
  url?: string;
  /** Path every endpoint lives under. Older servers use `/v3beta` or `/v3alpha`. */
  apiPrefix?: string;
  /** Default timeout in milliseconds for every call but watches. No timeout if unset. */
  timeout?: number;
  /** Replaces the HTTP transport, e.g. with a {@linkcode TransportInMemory}. */
  transport?: Transport;
  /** The `fetch` used by the HTTP transport. Ignored when `transport` is given. */
  fetch?: typeof fetch;
  observability?: Partial<Observability>;
};

export type ResolvedClientOpts = {
  url: string;
  apiPrefix: string;
  timeout: number | null;
  transport: Transport;
  observability: Observability;
};

export function resolveClientOpts(opts: ClientOpts = {}): ResolvedClientOpts {
  const url = opts.url ?? DEFAULT_URL;

  if (!URL.canParse(url)) {
    throw new ValidationError(`url must be an absolute URL, not "${url}"`);
  }

  const protocol = new URL(url).protocol;

  if (protocol !== "http:" && protocol !== "https:") {
    throw new ValidationError(`url must be http or https, not "${protocol}"`);
  }

  const timeout = opts.timeout ?? null;

  if (timeout !== null && !(Number.isFinite(timeout) && timeout > 0)) {
    throw new ValidationError(
      `timeout must be a positive number of milliseconds, not ${timeout}`,
    );
  }

  let apiPrefix = opts.apiPrefix ?? DEFAULT_API_PREFIX;

  if (!apiPrefix.startsWith("/")) {
    apiPrefix = `/${apiPrefix}`;
  }

  return {
    url,
    apiPrefix: apiPrefix.replace(/\/+$/, ""),
    timeout,
    transport: opts.transport ?? new TransportHttp(url, { fetch: opts.fetch }),
    observability: createObservability(opts.observability),
  };
}
