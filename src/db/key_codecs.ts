import { concat, fromString, toString } from "uint8arrays";
import { ProtocolError, ValidationError } from "../errors.ts";
import {
  bigintToBytes,
  bytesToBigint,
  bytesToUint16,
  describeType,
  uint16ToBytes,
} from "../util/bytes.ts";

/** Turns application keys into the bytes stored after a map's slot prefix, and back. */
export interface KeyCodec<K> {
  readonly name: string;
  encode(key: K): Uint8Array;
  decode(bytes: Uint8Array): K;
}

const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const MAX_OID = BigInt("0xffffffffffffffff");

/** The 16 bytes of a UUID in its canonical text form. */
export function uuidToBytes(uuid: string): Uint8Array {
  if (typeof uuid !== "string" || !UUID_PATTERN.test(uuid)) {
    throw new ValidationError(`Not a UUID: ${JSON.stringify(uuid)}`);
  }

  return fromString(uuid.replaceAll("-", "").toLowerCase(), "base16");
}

export function bytesToUuid(bytes: Uint8Array): string {
  if (bytes.byteLength !== 16) {
    throw new ProtocolError(
      `A UUID is 16 bytes, not ${bytes.byteLength}`,
    );
  }

  const hex = toString(bytes, "base16");

  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join("-");
}

export function checkOid(oid: bigint): bigint {
  if (typeof oid !== "bigint" || oid < BigInt(0) || oid > MAX_OID) {
    throw new ValidationError(
      `An OID is an unsigned 64 bit bigint, not ${describeType(oid)} ${String(oid)}`,
    );
  }

  return oid;
}

function checkLength(bytes: Uint8Array, length: number, what: string) {
  if (bytes.byteLength !== length) {
    throw new ProtocolError(
      `Stored ${what} must be ${length} bytes, not ${bytes.byteLength}`,
    );
  }
}

function checkString(value: string, what: string): string {
  if (typeof value !== "string") {
    throw new ValidationError(`${what} must be a string, not ${describeType(value)}`);
  }

  return value;
}

/** UTF-8 text. Sorts by code point. */
export const stringKeys: KeyCodec<string> = {
  name: "string",
  encode: (key) => fromString(checkString(key, "key"), "utf8"),
  decode: (bytes) => toString(bytes, "utf8"),
};

/** UUIDs as their 16 raw bytes. */
export const uuidKeys: KeyCodec<string> = {
  name: "uuid",
  encode: (key) => uuidToBytes(key),
  decode: (bytes) => bytesToUuid(bytes),
};

/** Unsigned 64 bit object ids, big-endian so that numeric order is key order. */
export const oidKeys: KeyCodec<bigint> = {
  name: "oid",
  encode: (key) => bigintToBytes(checkOid(key)),
  decode: (bytes) => {
    checkLength(bytes, 8, "OID key");

    return bytesToBigint(bytes);
  },
};

/** Unsigned 16 bit integers, big-endian. */
export const uint16Keys: KeyCodec<number> = {
  name: "uint16",
  encode: (key) => {
    if (!Number.isInteger(key) || key < 0 || key > 0xffff) {
      throw new ValidationError(
        `key must be an integer between 0 and 65535, not ${key}`,
      );
    }

    return uint16ToBytes(key);
  },
  decode: (bytes) => {
    checkLength(bytes, 2, "uint16 key");

    return bytesToUint16(bytes);
  },
};

/**
 * A UUID followed by UTF-8 text. All keys sharing a UUID are adjacent, so
 * `[uuid, ""]` is a prefix of every one of them.
 */
export const uuidStringKeys: KeyCodec<[string, string]> = {
  name: "uuid-string",
  encode: ([uuid, text]) =>
    concat([uuidToBytes(uuid), fromString(checkString(text, "key"), "utf8")]),
  decode: (bytes) => {
    if (bytes.byteLength < 16) {
      throw new ProtocolError(
        `Stored UUID-string key must be at least 16 bytes, not ${bytes.byteLength}`,
      );
    }

    return [
      bytesToUuid(bytes.subarray(0, 16)),
      toString(bytes.subarray(16), "utf8"),
    ];
  },
};

/** Two UUIDs, 32 bytes. */
export const uuidUuidKeys: KeyCodec<[string, string]> = {
  name: "uuid-uuid",
  encode: ([first, second]) => concat([uuidToBytes(first), uuidToBytes(second)]),
  decode: (bytes) => {
    checkLength(bytes, 32, "UUID-UUID key");

    return [bytesToUuid(bytes.subarray(0, 16)), bytesToUuid(bytes.subarray(16))];
  },
};
