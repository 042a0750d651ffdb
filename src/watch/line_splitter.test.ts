import { test } from "node:test";
import assert from "node:assert/strict";
import { LineSplitter, splitLines } from "./line_splitter.ts";
import { bytes, text } from "../test/utils.ts";

test("LineSplitter", async (t) => {
  await t.test("emits complete lines only", () => {
    const splitter = new LineSplitter();

    assert.deepEqual(splitter.push(bytes('{"a":')), []);
    assert.deepEqual(splitter.push(bytes('1}\n{"b"')).map(text), ['{"a":1}']);
    assert.deepEqual(text(splitter.remainder), '{"b"');
    assert.deepEqual(splitter.push(bytes(":2}\n")).map(text), ['{"b":2}']);
    assert.equal(splitter.remainder.byteLength, 0);
  });

  await t.test("emits several lines from one chunk and skips empty ones", () => {
    const splitter = new LineSplitter();

    assert.deepEqual(splitter.push(bytes("one\n\ntwo\nthree")).map(text), [
      "one",
      "two",
    ]);
    assert.equal(text(splitter.remainder), "three");
  });
});

test("splitLines reassembles lines across any chunking", async () => {
  const message = bytes('{"result":{"events":[]}}\n{"result":{}}\nlast');

  for (const size of [1, 2, 3, 7, 16, message.byteLength]) {
    async function* chunks() {
      for (let i = 0; i < message.byteLength; i += size) {
        yield message.subarray(i, i + size);
      }
    }

    const lines: string[] = [];

    for await (const line of splitLines(chunks())) {
      lines.push(text(line));
    }

    assert.deepEqual(lines, [
      '{"result":{"events":[]}}',
      '{"result":{}}',
      "last",
    ], `chunk size ${size}`);
  }
});
