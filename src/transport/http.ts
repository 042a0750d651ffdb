import { ProtocolError, TransportError } from "../errors.ts";
import { isJsonObject } from "../wire/decode.ts";
import type { Transport, TransportRequestOpts } from "./types.ts";

const REQUEST_HEADERS = { "Content-Type": "application/json" } as const;

export type TransportHttpOpts = {
  /** Defaults to the global `fetch`. */
  fetch?: typeof fetch;
};

/** A {@linkcode Transport} which POSTs to the gateway over HTTP using `fetch`. */
export class TransportHttp implements Transport {
  private readonly baseUrl: string;
  private readonly fetch: typeof fetch;

  constructor(readonly url: string, opts: TransportHttpOpts = {}) {
    this.baseUrl = url.replace(/\/+$/, "");
    this.fetch = opts.fetch ?? globalThis.fetch;
  }

  async request(
    path: string,
    body: unknown,
    opts: TransportRequestOpts = {},
  ): Promise<unknown> {
    const response = await this.post(path, JSON.stringify(body), opts.signal);

    let text: string;

    try {
      text = await response.text();
    } catch (err) {
      throw new TransportError(`Reading the response of ${path} failed`, {
        cause: err,
      });
    }

    let parsed: unknown;

    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new ProtocolError(
        `Expected JSON from ${path} (status ${response.status}), got ${
          JSON.stringify(text.slice(0, 200))
        }`,
        { cause: err },
      );
    }

    // The gateway puts its error details into the body. Anything else with a bad status is not from it.
    if (
      !response.ok &&
      !(isJsonObject(parsed) && ("error" in parsed || "code" in parsed))
    ) {
      throw new ProtocolError(
        `Unexpected response status ${response.status} from ${path}`,
      );
    }

    return parsed;
  }

  async stream(
    path: string,
    messages: unknown[],
    opts: TransportRequestOpts = {},
  ): Promise<AsyncIterable<Uint8Array>> {
    const response = await this.post(
      path,
      messages.map((message) => JSON.stringify(message)).join("\n"),
      opts.signal,
    );

    if (!response.ok) {
      // The body of a refused stream is never read; release the connection.
      await response.body?.cancel();

      throw new ProtocolError(
        `Unexpected response status ${response.status} from ${path}`,
      );
    }

    if (response.body === null) {
      throw new ProtocolError(`Streaming response from ${path} has no body`);
    }

    return readChunks(response.body);
  }

  private async post(
    path: string,
    body: string,
    signal?: AbortSignal,
  ): Promise<Response> {
    try {
      return await this.fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: REQUEST_HEADERS,
        body,
        signal,
      });
    } catch (err) {
      throw new TransportError(`POST ${path} failed`, { cause: err });
    }
  }
}

async function* readChunks(
  body: AsyncIterable<unknown>,
): AsyncGenerator<Uint8Array> {
  for await (const chunk of body) {
    if (chunk instanceof Uint8Array) {
      yield chunk;
    }
  }
}
