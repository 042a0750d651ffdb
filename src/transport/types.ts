export type TransportRequestOpts = {
  /** Aborts the request, or for a stream the whole response body. */
  signal?: AbortSignal;
};

/**
 * Carries gateway calls. Every call is a single POST of a JSON body to `path`
 * (the API prefix included, e.g. `/v3/kv/put`).
 */
export interface Transport {
  /**
   * Send `body` and resolve with the parsed JSON response.
   *
   * Error bodies the gateway sends are returned like any other body, it is up to the caller to decode them.
   */
  request(
    path: string,
    body: unknown,
    opts?: TransportRequestOpts,
  ): Promise<unknown>;
  /**
   * Send `messages` as newline-separated JSON and yield the response body in chunks as it arrives.
   * Chunk boundaries carry no meaning.
   */
  stream(
    path: string,
    messages: unknown[],
    opts?: TransportRequestOpts,
  ): Promise<AsyncIterable<Uint8Array>>;
}
