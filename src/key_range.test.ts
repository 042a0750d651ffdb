import { test } from "node:test";
import assert from "node:assert/strict";
import {
  allKeys,
  keyRangeToString,
  marshalKeyRange,
  prefix,
  range,
  resolveEnd,
  single,
  toKeyRange,
} from "./key_range.ts";
import { ValidationError } from "./errors.ts";

const enc = new TextEncoder();

test("resolveEnd", () => {
  assert.equal(resolveEnd(single(enc.encode("a"))), null);
  assert.deepEqual(resolveEnd(prefix(enc.encode("k/"))), enc.encode("k0"));
  assert.deepEqual(
    resolveEnd(range(enc.encode("a"), enc.encode("c"))),
    enc.encode("c"),
  );
});

test("allKeys is the zero byte pseudo-range", () => {
  const keys = allKeys();

  assert.deepEqual(keys.start, new Uint8Array([0]));
  assert.deepEqual(resolveEnd(keys), new Uint8Array([0]));
  assert.deepEqual(marshalKeyRange(keys), { key: "AA==", range_end: "AA==" });
});

test("marshalKeyRange omits range_end for a single key", () => {
  assert.deepEqual(marshalKeyRange(single(enc.encode("foo"))), {
    key: "Zm9v",
  });
  assert.deepEqual(marshalKeyRange(prefix(enc.encode("foo"))), {
    key: "Zm9v",
    range_end: "Zm9w",
  });
});

test("toKeyRange accepts bytes and ranges", () => {
  assert.deepEqual(toKeyRange(enc.encode("x")), {
    kind: "single",
    start: enc.encode("x"),
  });

  const keys = prefix(enc.encode("x"));
  assert.deepEqual(toKeyRange(keys), keys);
});

test("toKeyRange rejects anything else", () => {
  assert.throws(() => toKeyRange("foo"), ValidationError);
  assert.throws(() => toKeyRange(42), ValidationError);
  assert.throws(() => toKeyRange({ kind: "single", start: "foo" }), ValidationError);
  assert.throws(() => toKeyRange({ kind: "range", start: enc.encode("a") }), ValidationError);
});

test("a prefix range cannot carry an explicit end", () => {
  assert.throws(
    () =>
      toKeyRange({
        kind: "prefix",
        start: enc.encode("a"),
        end: enc.encode("b"),
      }),
    ValidationError,
  );
});

test("range rejects an empty end", () => {
  assert.throws(() => range(enc.encode("a"), new Uint8Array()), ValidationError);
});

test("keyRangeToString", () => {
  assert.equal(keyRangeToString(prefix(enc.encode("k/"))), "KeyRange(k/*)");
  assert.equal(
    keyRangeToString(range(enc.encode("a"), new Uint8Array([0]))),
    "KeyRange(a..0x00)",
  );
});
