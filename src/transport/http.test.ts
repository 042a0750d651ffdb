import { test } from "node:test";
import assert from "node:assert/strict";
import { ProtocolError, TransportError } from "../errors.ts";
import { TransportHttp } from "./http.ts";

type Sent = { url: string; method?: string; contentType: string | null; body: string };

function fakeFetch(
  respond: (sent: Sent) => Response,
): { fetch: typeof fetch; sent: Sent[] } {
  const sent: Sent[] = [];

  const fetch = (input: string | URL | Request, init?: RequestInit) => {
    const request = {
      url: String(input),
      method: init?.method,
      contentType: new Headers(init?.headers).get("Content-Type"),
      body: typeof init?.body === "string" ? init.body : "",
    };

    sent.push(request);

    return Promise.resolve(respond(request));
  };

  return { fetch, sent };
}

test("TransportHttp.request", async (t) => {
  await t.test("POSTs JSON to the base URL plus path", async () => {
    const { fetch, sent } = fakeFetch(() =>
      new Response(JSON.stringify({ header: { revision: "3" } }))
    );
    const transport = new TransportHttp("http://localhost:2379/", { fetch });

    const body = await transport.request("/v3/kv/range", { key: "Zm9v" });

    assert.deepEqual(body, { header: { revision: "3" } });
    assert.deepEqual(sent, [{
      url: "http://localhost:2379/v3/kv/range",
      method: "POST",
      contentType: "application/json",
      body: '{"key":"Zm9v"}',
    }]);
  });

  await t.test("returns gateway error bodies for decoding", async () => {
    const { fetch } = fakeFetch(() =>
      new Response(
        JSON.stringify({ error: "etcdserver: key is not provided", code: 3 }),
        { status: 400 },
      )
    );
    const transport = new TransportHttp("http://localhost:2379", { fetch });

    assert.deepEqual(await transport.request("/v3/kv/put", {}), {
      error: "etcdserver: key is not provided",
      code: 3,
    });
  });

  await t.test("rejects bodies which are not JSON", async () => {
    const { fetch } = fakeFetch(() =>
      new Response("<html>bad gateway</html>", { status: 502 })
    );
    const transport = new TransportHttp("http://localhost:2379", { fetch });

    await assert.rejects(transport.request("/v3/kv/put", {}), ProtocolError);
  });

  await t.test("rejects a bad status without an error body", async () => {
    const { fetch } = fakeFetch(() =>
      new Response(JSON.stringify({ hello: "there" }), { status: 500 })
    );
    const transport = new TransportHttp("http://localhost:2379", { fetch });

    await assert.rejects(
      transport.request("/v3/kv/put", {}),
      (err: unknown) =>
        err instanceof ProtocolError &&
        err.message === "Unexpected response status 500 from /v3/kv/put",
    );
  });

  await t.test("wraps connection failures", async () => {
    const failure = new TypeError("fetch failed");
    const transport = new TransportHttp("http://localhost:2379", {
      fetch: () => Promise.reject(failure),
    });

    await assert.rejects(
      transport.request("/v3/maintenance/status", {}),
      (err: unknown) => err instanceof TransportError && err.cause === failure,
    );
  });
});

test("TransportHttp.stream", async (t) => {
  await t.test("sends newline-joined messages and yields the body", async () => {
    const { fetch, sent } = fakeFetch(() => new Response("line one\nline two\n"));
    const transport = new TransportHttp("http://localhost:2379", { fetch });

    const body = await transport.stream("/v3/watch", [{ a: 1 }, { b: 2 }]);
    const chunks: Uint8Array[] = [];

    for await (const chunk of body) {
      chunks.push(chunk);
    }

    assert.equal(sent[0].body, '{"a":1}\n{"b":2}');
    assert.equal(
      Buffer.concat(chunks).toString("utf8"),
      "line one\nline two\n",
    );
  });

  await t.test("rejects a bad status", async () => {
    const { fetch } = fakeFetch(() => new Response("nope", { status: 404 }));
    const transport = new TransportHttp("http://localhost:2379", { fetch });

    await assert.rejects(transport.stream("/v3/watch", []), ProtocolError);
  });

  await t.test("releases the body of a bad status", async () => {
    let cancelled = false;
    const { fetch } = fakeFetch(() =>
      new Response(
        new ReadableStream({
          cancel() {
            cancelled = true;
          },
        }),
        { status: 503 },
      )
    );
    const transport = new TransportHttp("http://localhost:2379", { fetch });

    await assert.rejects(
      transport.stream("/v3/watch", []),
      (err: unknown) =>
        err instanceof ProtocolError &&
        err.message === "Unexpected response status 503 from /v3/watch",
    );
    assert.equal(cancelled, true);
  });
});
