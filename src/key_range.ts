import { ValidationError } from "./errors.ts";
import {
  assertBytes,
  displayBytes,
  encodeBase64,
  OPEN_END,
  prefixEnd,
} from "./util/bytes.ts";

/** Exactly one key. */
export type SingleKey = { kind: "single"; start: Uint8Array };

/** Every key starting with `start`. The end is derived, never stored. */
export type PrefixKeys = { kind: "prefix"; start: Uint8Array };

/** Every key in `[start, end)`. An `end` of `[0]` leaves the range open. */
export type RangeKeys = { kind: "range"; start: Uint8Array; end: Uint8Array };

/** A set of keys: a single key, a prefix, or an explicit range. */
export type KeyRange = SingleKey | PrefixKeys | RangeKeys;

/** What API methods accept wherever a key range is expected. */
export type KeyArg = Uint8Array | KeyRange;

export function single(key: Uint8Array): SingleKey {
  assertBytes(key, "key");

  return { kind: "single", start: key };
}

export function prefix(key: Uint8Array): PrefixKeys {
  assertBytes(key, "prefix");

  return { kind: "prefix", start: key };
}

export function range(start: Uint8Array, end: Uint8Array): RangeKeys {
  assertBytes(start, "range start");
  assertBytes(end, "range end");

  if (end.byteLength === 0) {
    throw new ValidationError("range end must not be empty");
  }

  return { kind: "range", start, end };
}

/** Every key in the store: the gateway reads a start and end of `\0` as the whole keyspace. */
export function allKeys(): RangeKeys {
  return range(OPEN_END, OPEN_END);
}

/** Keys greater than or equal to `start`. */
export function fromKey(start: Uint8Array): RangeKeys {
  return range(start, OPEN_END);
}

/** The exclusive end of a range as sent over the wire, `null` for a single key. */
export function resolveEnd(keys: KeyRange): Uint8Array | null {
  switch (keys.kind) {
    case "single":
      return null;
    case "prefix":
      return prefixEnd(keys.start);
    case "range":
      return keys.end;
  }
}

/** Normalise a {@linkcode KeyArg}. This is the only place argument shapes are checked. */
export function toKeyRange(arg: unknown): KeyRange {
  if (arg instanceof Uint8Array) {
    return single(arg);
  }

  if (typeof arg === "object" && arg !== null && "kind" in arg && "start" in arg) {
    switch (arg.kind) {
      case "single":
        return single(bytesField(arg.start));
      case "prefix":
        if ("end" in arg && arg.end !== undefined) {
          throw new ValidationError(
            "either a range end or a prefix can be set, but not both",
          );
        }

        return prefix(bytesField(arg.start));
      case "range":
        if ("end" in arg) {
          return range(bytesField(arg.start), bytesField(arg.end));
        }
    }
  }

  throw new ValidationError(
    "key must either be a Uint8Array or a KeyRange made by single(), prefix() or range()",
  );
}

function bytesField(value: unknown): Uint8Array {
  assertBytes(value, "key");

  return value;
}

/** The `key` / `range_end` pair the gateway expects. */
export function marshalKeyRange(
  keys: KeyRange,
): { key: string; range_end?: string } {
  const end = resolveEnd(keys);

  if (end === null) {
    return { key: encodeBase64(keys.start) };
  }

  return { key: encodeBase64(keys.start), range_end: encodeBase64(end) };
}

export function keyRangeToString(keys: KeyRange): string {
  switch (keys.kind) {
    case "single":
      return `KeyRange(${displayBytes(keys.start)})`;
    case "prefix":
      return `KeyRange(${displayBytes(keys.start)}*)`;
    case "range":
      return `KeyRange(${displayBytes(keys.start)}..${displayBytes(keys.end)})`;
  }
}
