import { test } from "node:test";
import assert from "node:assert/strict";
import { TransportInMemory } from "./in_memory.ts";

test("TransportInMemory keeps revisions", async () => {
  const transport = new TransportInMemory();

  assert.deepEqual(
    await transport.request("/v3/kv/put", { key: "YQ==", value: "MQ==" }),
    {
      header: {
        cluster_id: "14841639068965178418",
        member_id: "10276657743932975437",
        revision: "2",
        raft_term: "2",
      },
    },
  );

  await transport.request("/v3/kv/put", { key: "YQ==", value: "Mg==" });

  assert.deepEqual(
    await transport.request("/v3/kv/range", { key: "YQ==" }),
    {
      header: {
        cluster_id: "14841639068965178418",
        member_id: "10276657743932975437",
        revision: "3",
        raft_term: "2",
      },
      count: "1",
      kvs: [{
        key: "YQ==",
        create_revision: "2",
        mod_revision: "3",
        version: "2",
        value: "Mg==",
      }],
    },
  );
});

test("TransportInMemory reads at a past revision", async () => {
  const transport = new TransportInMemory();

  await transport.request("/v3/kv/put", { key: "YQ==", value: "MQ==" });
  await transport.request("/v3/kv/put", { key: "YQ==", value: "Mg==" });

  assert.deepEqual(
    await transport.request("/v3/kv/range", { key: "YQ==", revision: 2 }),
    {
      header: {
        cluster_id: "14841639068965178418",
        member_id: "10276657743932975437",
        revision: "3",
        raft_term: "2",
      },
      count: "1",
      kvs: [{
        key: "YQ==",
        create_revision: "2",
        mod_revision: "2",
        version: "1",
        value: "MQ==",
      }],
    },
  );
});

test("TransportInMemory refuses duplicate keys in a transaction", async () => {
  const transport = new TransportInMemory();

  assert.deepEqual(
    await transport.request("/v3/kv/txn", {
      success: [
        { request_put: { key: "YQ==", value: "MQ==" } },
        { request_delete_range: { key: "YQ==" } },
      ],
    }),
    {
      error: "etcdserver: duplicate key given in txn request",
      code: 3,
      message: "etcdserver: duplicate key given in txn request",
    },
  );

  // Nothing was applied.
  assert.deepEqual(
    await transport.request("/v3/kv/range", { key: "YQ==", count_only: true }),
    {
      header: {
        cluster_id: "14841639068965178418",
        member_id: "10276657743932975437",
        revision: "1",
        raft_term: "2",
      },
      count: "0",
    },
  );
});

test("TransportInMemory compares every key in a range", async () => {
  const transport = new TransportInMemory();

  await transport.request("/v3/kv/put", { key: "YQ==", value: "MQ==" });
  await transport.request("/v3/kv/put", { key: "Yg==", value: "MQ==" });

  const header = {
    cluster_id: "14841639068965178418",
    member_id: "10276657743932975437",
    revision: "3",
    raft_term: "2",
  };
  const olderThan = (revision: number) => ({
    compare: [{
      key: "YQ==",
      range_end: "Yw==",
      target: "MOD",
      result: "LESS",
      mod_revision: revision,
    }],
  });

  assert.deepEqual(await transport.request("/v3/kv/txn", olderThan(3)), {
    header,
  });
  assert.deepEqual(await transport.request("/v3/kv/txn", olderThan(4)), {
    header,
    succeeded: true,
  });
});

test("TransportInMemory limits the size of a transaction", async () => {
  const transport = new TransportInMemory({ maxTxnOps: 2 });
  const put = (key: string) => ({ request_put: { key, value: "MQ==" } });

  assert.deepEqual(
    await transport.request("/v3/kv/txn", {
      success: [put("YQ=="), put("Yg=="), put("Yw==")],
    }),
    {
      error: "etcdserver: too many operations in txn request",
      code: 3,
      message: "etcdserver: too many operations in txn request",
    },
  );
  assert.deepEqual(
    await transport.request("/v3/kv/txn", { success: [put("YQ=="), put("Yg==")] }),
    {
      header: {
        cluster_id: "14841639068965178418",
        member_id: "10276657743932975437",
        revision: "2",
        raft_term: "2",
      },
      succeeded: true,
      responses: [
        {
          response_put: {
            header: {
              cluster_id: "14841639068965178418",
              member_id: "10276657743932975437",
              revision: "2",
              raft_term: "2",
            },
          },
        },
        {
          response_put: {
            header: {
              cluster_id: "14841639068965178418",
              member_id: "10276657743932975437",
              revision: "2",
              raft_term: "2",
            },
          },
        },
      ],
    },
  );
});

test("TransportInMemory answers unknown paths like the gateway", async () => {
  const transport = new TransportInMemory();

  assert.deepEqual(await transport.request("/v3beta/kv/range", {}), {
    code: 5,
    message: "Not Found",
  });
});

test("TransportInMemory.closeStreams ends open watch streams", async () => {
  const transport = new TransportInMemory();
  const body = await transport.stream("/v3/watch", [{
    create_request: { key: "YQ==" },
  }]);

  assert.equal(transport.openStreams, 1);

  transport.closeStreams();

  const lines: string[] = [];

  for await (const chunk of body) {
    lines.push(Buffer.from(chunk).toString("utf8"));
  }

  assert.deepEqual(lines, [
    '{"result":{"header":{"cluster_id":"14841639068965178418","member_id":"10276657743932975437","revision":"1","raft_term":"2"},"watch_id":"0","created":true}}\n',
  ]);
  assert.equal(transport.openStreams, 0);
});
