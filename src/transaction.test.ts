import { test } from "node:test";
import assert from "node:assert/strict";
import { TransactionFailedError, ValidationError } from "./errors.ts";
import { prefix } from "./key_range.ts";
import {
  assertSucceeded,
  compareCreated,
  compareModified,
  compareValue,
  compareVersion,
  marshalComparator,
  marshalTransaction,
  opDelete,
  opGet,
  opSet,
  type SubmitOutcome,
  toCompareOperator,
  transaction,
} from "./transaction.ts";

const enc = new TextEncoder();
const key = enc.encode("foo");

test("comparators marshal to the gateway's enum names", () => {
  assert.deepEqual(marshalComparator(compareValue(key, "==", enc.encode("bar"))), {
    key: "Zm9v",
    result: "EQUAL",
    target: "VALUE",
    value: "YmFy",
  });
  assert.deepEqual(marshalComparator(compareVersion(key, "!=", 0)), {
    key: "Zm9v",
    result: "NOT_EQUAL",
    target: "VERSION",
    version: 0,
  });
  assert.deepEqual(marshalComparator(compareCreated(key, ">", 3)), {
    key: "Zm9v",
    result: "GREATER",
    target: "CREATE",
    create_revision: 3,
  });
  assert.deepEqual(marshalComparator(compareModified(key, "<", 9)), {
    key: "Zm9v",
    result: "LESS",
    target: "MOD",
    mod_revision: 9,
  });
  assert.deepEqual(
    marshalComparator(compareModified(key, "<", 9, { rangeEnd: enc.encode("fop") })),
    {
      key: "Zm9v",
      range_end: "Zm9w",
      result: "LESS",
      target: "MOD",
      mod_revision: 9,
    },
  );
});

test("comparators validate their arguments", () => {
  assert.throws(() => toCompareOperator("="), ValidationError);
  assert.throws(() => toCompareOperator(">="), ValidationError);
  assert.equal(toCompareOperator("!="), "!=");
  assert.throws(() => compareModified(key, "<", 1.5), ValidationError);
});

test("operations", () => {
  assert.deepEqual(opSet(key, enc.encode("bar"), { lease: BigInt(5) }), {
    op: "set",
    key,
    value: enc.encode("bar"),
    lease: BigInt(5),
  });
  assert.deepEqual(opSet(key, enc.encode("bar"), { lease: { leaseId: BigInt(6) } }).lease, BigInt(6));
  assert.deepEqual(opGet(key), {
    op: "get",
    keys: { kind: "single", start: key },
    opts: {},
  });
  assert.deepEqual(opDelete(prefix(key), { returnPrevious: true }), {
    op: "delete",
    keys: { kind: "prefix", start: key },
    returnPrevious: true,
  });
});

test("marshalTransaction", () => {
  const txn = transaction({
    compare: [compareVersion(key, "==", 0)],
    success: [opSet(key, enc.encode("bar"))],
    failure: [opGet(key, { keysOnly: true })],
  });

  assert.deepEqual(marshalTransaction(txn), {
    compare: [{ key: "Zm9v", result: "EQUAL", target: "VERSION", version: 0 }],
    success: [{ request_put: { key: "Zm9v", value: "YmFy" } }],
    failure: [{ request_range: { key: "Zm9v", keys_only: true } }],
  });

  assert.deepEqual(
    marshalTransaction(transaction({ success: [opDelete(prefix(key))] })),
    {
      success: [{ request_delete_range: { key: "Zm9v", range_end: "Zm9w" } }],
    },
  );
});

test("assertSucceeded", () => {
  const header = {
    raftTerm: 1,
    revision: 4,
    clusterId: BigInt(1),
    memberId: BigInt(1),
  };

  const succeeded: SubmitOutcome = { succeeded: true, header, responses: [] };
  assertSucceeded(succeeded);

  const failed: SubmitOutcome = { succeeded: false, header, responses: [] };

  assert.throws(
    () => assertSucceeded(failed),
    (err: unknown) =>
      err instanceof TransactionFailedError && err.header.revision === 4,
  );
});
