import { test } from "node:test";
import assert from "node:assert/strict";
import { Client } from "./client.ts";
import {
  isErr,
  notErr,
  StoreError,
  TransactionFailedError,
  ValidationError,
} from "./errors.ts";
import { allKeys, prefix, range } from "./key_range.ts";
import { consoleLogger, silentLogger } from "./observability.ts";
import {
  assertSucceeded,
  compareValue,
  compareVersion,
  opDelete,
  opGet,
  opSet,
  transaction,
} from "./transaction.ts";
import { TransportInMemory } from "./transport/in_memory.ts";
import { bytes, makeClient, text } from "./test/utils.ts";

test("Client.status", async () => {
  const { client } = makeClient();

  const status = await client.status();

  assert.equal(status.header.revision, 1);
  assert.equal(status.header.clusterId, BigInt("14841639068965178418"));
  assert.equal(status.leader, BigInt("10276657743932975437"));
  assert.equal(status.version, "3.5.0");
});

test("Client.set and Client.get", async (t) => {
  await t.test("read back a single key", async () => {
    const { client } = makeClient();

    const written = await client.set(bytes("greeting"), bytes("hello"));
    const read = await client.get(bytes("greeting"));

    assert.equal(written.header.revision, 2);
    assert.equal(written.previous, null);
    assert.equal(read.count, 1);
    assert.equal(read.more, false);
    assert.equal(text(read.kvs[0].value), "hello");
    assert.equal(read.kvs[0].createRevision, 2);
    assert.equal(read.kvs[0].modRevision, 2);
    assert.equal(read.kvs[0].version, 1);
  });

  await t.test("a missing key reads as an empty range", async () => {
    const { client } = makeClient();

    const read = await client.get(bytes("nothing"));

    assert.equal(read.count, 0);
    assert.deepEqual(read.kvs, []);
  });

  await t.test("a prefix reads every key under it, in key order", async () => {
    const { client } = makeClient();

    await client.set(bytes("a/2"), bytes("two"));
    await client.set(bytes("a/1"), bytes("one"));
    await client.set(bytes("b/1"), bytes("other"));

    const read = await client.get(prefix(bytes("a/")));

    assert.deepEqual(read.kvs.map((kv) => text(kv.key)), ["a/1", "a/2"]);
    assert.deepEqual(read.kvs.map((kv) => text(kv.value)), ["one", "two"]);
  });

  await t.test("ranges and the whole keyspace", async () => {
    const { client } = makeClient();

    for (const key of ["a", "b", "c", "d"]) {
      await client.set(bytes(key), bytes(key));
    }

    const middle = await client.get(range(bytes("b"), bytes("d")));
    const everything = await client.get(allKeys(), { countOnly: true });
    const limited = await client.get(allKeys(), {
      limit: 1,
      sortOrder: "DESCEND",
    });

    assert.deepEqual(middle.kvs.map((kv) => text(kv.key)), ["b", "c"]);
    assert.equal(everything.count, 4);
    assert.deepEqual(everything.kvs, []);
    assert.deepEqual(limited.kvs.map((kv) => text(kv.key)), ["d"]);
    assert.equal(limited.more, true);
  });

  await t.test("keys and values are arbitrary bytes", async () => {
    const { client } = makeClient();
    const key = new Uint8Array([0, 1, 0xff, 0]);
    const value = new Uint8Array([0, 0, 0]);

    await client.set(key, value);

    const read = await client.get(key);

    assert.deepEqual(read.kvs[0].key, key);
    assert.deepEqual(read.kvs[0].value, value);
  });

  await t.test("return the previous value on request", async () => {
    const { client } = makeClient();

    await client.set(bytes("k"), bytes("old"));

    const written = await client.set(bytes("k"), bytes("new"), {
      returnPrevious: true,
    });

    assert.equal(text(written.previous?.value ?? new Uint8Array()), "old");
  });
});

test("Client.delete", async () => {
  const { client } = makeClient();

  await client.set(bytes("k/1"), bytes("1"));
  await client.set(bytes("k/2"), bytes("2"));

  const missing = await client.delete(bytes("other"));
  const deleted = await client.delete(prefix(bytes("k/")), {
    returnPrevious: true,
  });

  assert.equal(missing.deleted, 0);
  assert.equal(missing.header.revision, 3);
  assert.equal(deleted.deleted, 2);
  assert.equal(deleted.header.revision, 4);
  assert.deepEqual(deleted.previous.map((kv) => text(kv.value)), ["1", "2"]);
  assert.equal((await client.get(prefix(bytes("k/")))).count, 0);
});

test("Client.submit", async (t) => {
  await t.test("an unconditional transaction succeeds every time", async () => {
    const { client } = makeClient();
    const txn = transaction({ success: [opSet(bytes("k"), bytes("v"))] });

    const first = await client.submit(txn);
    const second = await client.submit(txn);

    assert.equal(first.succeeded, true);
    assert.equal(second.succeeded, true);
    assert.equal(first.header.revision, 2);
    assert.equal(second.header.revision, 3);
  });

  await t.test("the compare picks the branch", async () => {
    const { client } = makeClient();

    await client.set(bytes("k1"), bytes("a"));

    const branches = (expected: string) =>
      transaction({
        compare: [compareValue(bytes("k1"), "==", bytes(expected))],
        success: [opSet(bytes("k2"), bytes("ok"))],
        failure: [opSet(bytes("k2"), bytes("no"))],
      });

    const taken = await client.submit(branches("a"));

    assertSucceeded(taken);
    assert.equal(text((await client.get(bytes("k2"))).kvs[0].value), "ok");

    const notTaken = await client.submit(branches("b"));

    assert.equal(notTaken.succeeded, false);
    assert.equal(text((await client.get(bytes("k2"))).kvs[0].value), "no");
    assert.throws(() => assertSucceeded(notTaken), TransactionFailedError);
  });

  await t.test("responses follow the operations", async () => {
    const { client } = makeClient();

    await client.set(bytes("a"), bytes("1"));

    const outcome = await client.submit(transaction({
      compare: [compareVersion(bytes("a"), "==", 1)],
      success: [
        opGet(bytes("a")),
        opSet(bytes("b"), bytes("2")),
        opDelete(bytes("a"), { returnPrevious: true }),
      ],
    }));

    assertSucceeded(outcome);
    assert.deepEqual(outcome.responses.map((response) => response.kind), [
      "range",
      "revision",
      "deleted",
    ]);

    const [read, , deleted] = outcome.responses;

    assert.ok(read.kind === "range");
    assert.equal(text(read.kvs[0].value), "1");
    assert.ok(deleted.kind === "deleted");
    assert.equal(deleted.deleted, 1);
    assert.equal(outcome.header.revision, 3);
  });

  await t.test("the store refuses to mutate a key twice", async () => {
    const { client } = makeClient();

    await assert.rejects(
      client.submit(transaction({
        success: [
          opSet(bytes("k"), bytes("1")),
          opSet(bytes("k"), bytes("2")),
        ],
      })),
      (err: unknown) =>
        err instanceof StoreError &&
        err.code === 3 &&
        err.message === "etcdserver: duplicate key given in txn request",
    );

    assert.equal((await client.status()).header.revision, 1);
  });
});

test("Client validates before sending", async (t) => {
  const { client, transport } = makeClient();

  await t.test("get options", async () => {
    await assert.rejects(client.get(bytes("k"), { limit: -1 }), ValidationError);
  });

  await t.test("watches need a key", async () => {
    await assert.rejects(client.watch([], () => {}), ValidationError);
  });

  await t.test("leases need a positive whole ttl", async () => {
    await assert.rejects(client.lease(0), ValidationError);
    await assert.rejects(client.lease(1.5), ValidationError);
    await assert.rejects(client.lease(10, BigInt(-1)), ValidationError);
  });

  await t.test("timeouts", async () => {
    await assert.rejects(client.status({ timeout: 0 }), ValidationError);
  });

  await t.test("its errors are told apart from results", async () => {
    const result = await client.get(bytes("k"), { limit: -1 }).catch((
      err: Error,
    ) => err);

    assert.ok(isErr(result));
    assert.equal(notErr(result), false);
    assert.equal(notErr<string>("k"), true);
    assert.equal(isErr(new Error("not from the client")), false);
  });

  await t.test("nothing reached the store", () => {
    assert.deepEqual(transport.calls, []);
  });
});

test("Client configuration", async (t) => {
  await t.test("rejects urls it cannot use", () => {
    assert.throws(() => new Client({ url: "localhost:2379" }), ValidationError);
    assert.throws(() => new Client({ url: "ftp://localhost" }), ValidationError);
    assert.throws(() => new Client({ timeout: -5 }), ValidationError);
  });

  await t.test("normalises the api prefix", async () => {
    const transport = new TransportInMemory({ apiPrefix: "/v3beta" });
    const client = new Client({ transport, apiPrefix: "v3beta/" });

    await client.set(bytes("k"), bytes("v"));

    assert.deepEqual(transport.calls.map((call) => call.path), [
      "/v3beta/kv/put",
    ]);
  });

  await t.test("logs to the console unless given a logger", () => {
    const transport = new TransportInMemory();

    assert.equal(new Client({ transport }).observability.logger, consoleLogger);
    assert.equal(
      new Client({ transport, observability: { logger: silentLogger } })
        .observability.logger,
      silentLogger,
    );
  });

  await t.test("a wrong api prefix is reported by the store", async () => {
    const transport = new TransportInMemory({ apiPrefix: "/v3beta" });
    const client = new Client({ transport });

    await assert.rejects(
      client.status(),
      (err: unknown) => err instanceof StoreError && err.code === 5,
    );
  });
});

test("Client counts its calls", async () => {
  const { client } = makeClient();

  await client.set(bytes("k"), bytes("v"));
  await client.get(bytes("k"));
  await client.get(bytes("k"));
  await client.delete(bytes("k"));

  assert.deepEqual(client.observability.stats.marshal(), {
    status: 0,
    get: 2,
    set: 1,
    delete: 1,
    submit: 0,
    lease: 0,
    watch: 0,
  });
});
