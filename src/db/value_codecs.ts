import { deflateSync, inflateSync } from "node:zlib";
import { decode as decodeCbor, encode as encodeCbor } from "cbor-x";
import { concat, fromString, toString } from "uint8arrays";
import { ProtocolError, ValidationError } from "../errors.ts";
import { assertBytes, bigintToBytes, bytesToBigint } from "../util/bytes.ts";
import { bytesToUuid, checkOid, uuidToBytes } from "./key_codecs.ts";

/** Turns application values into the bytes stored in the store, and back. */
export interface ValueCodec<V> {
  readonly name: string;
  encode(value: V): Uint8Array;
  decode(bytes: Uint8Array): V;
}

export const stringValues: ValueCodec<string> = {
  name: "string",
  encode: (value) => {
    if (typeof value !== "string") {
      throw new ValidationError("value must be a string");
    }

    return fromString(value, "utf8");
  },
  decode: (bytes) => toString(bytes, "utf8"),
};

export const oidValues: ValueCodec<bigint> = {
  name: "oid",
  encode: (value) => bigintToBytes(checkOid(value)),
  decode: (bytes) => {
    if (bytes.byteLength !== 8) {
      throw new ProtocolError(
        `Stored OID value must be 8 bytes, not ${bytes.byteLength}`,
      );
    }

    return bytesToBigint(bytes);
  },
};

export const uuidValues: ValueCodec<string> = {
  name: "uuid",
  encode: (value) => uuidToBytes(value),
  decode: (bytes) => bytesToUuid(bytes),
};

/** A set of UUIDs, stored as their bytes back to back. */
export const uuidSetValues: ValueCodec<Set<string>> = {
  name: "uuid-set",
  encode: (value) => concat(Array.from(value, uuidToBytes)),
  decode: (bytes) => {
    if (bytes.byteLength % 16 !== 0) {
      throw new ProtocolError(
        `Stored UUID set must be a multiple of 16 bytes, not ${bytes.byteLength}`,
      );
    }

    const uuids = new Set<string>();

    for (let i = 0; i < bytes.byteLength; i += 16) {
      uuids.add(bytesToUuid(bytes.subarray(i, i + 16)));
    }

    return uuids;
  },
};

export const bytesValues: ValueCodec<Uint8Array> = {
  name: "bytes",
  encode: (value) => {
    assertBytes(value, "value");

    return value;
  },
  decode: (bytes) => bytes,
};

/**
 * JSON text. `marshal` turns a value into something `JSON.stringify` takes,
 * `unmarshal` checks what `JSON.parse` returned and builds the value from it.
 *
 * ```ts
 * const users = jsonValues({
 *   marshal: (user: User) => user.marshal(),
 *   unmarshal: User.parse,
 * });
 * ```
 */
export function jsonValues<V>(
  opts: { marshal: (value: V) => unknown; unmarshal: (json: unknown) => V },
): ValueCodec<V> {
  return {
    name: "json",
    encode: (value) => fromString(JSON.stringify(opts.marshal(value)), "utf8"),
    decode: (bytes) => {
      let json: unknown;

      try {
        json = JSON.parse(toString(bytes, "utf8"));
      } catch (err) {
        throw new ProtocolError("Stored value is not valid JSON", { cause: err });
      }

      return opts.unmarshal(json);
    },
  };
}

/** CBOR, with the same `marshal` and `unmarshal` pair as {@linkcode jsonValues}. Binary data survives as bytes. */
export function cborValues<V>(
  opts: { marshal: (value: V) => unknown; unmarshal: (data: unknown) => V },
): ValueCodec<V> {
  return {
    name: "cbor",
    encode: (value) => encodeCbor(opts.marshal(value)),
    decode: (bytes) => {
      let data: unknown;

      try {
        data = decodeCbor(bytes);
      } catch (err) {
        throw new ProtocolError("Stored value is not valid CBOR", { cause: err });
      }

      return opts.unmarshal(data);
    },
  };
}

export type Compression = "zlib";

/** Compresses whatever `codec` produces. */
export function compressed<V>(
  codec: ValueCodec<V>,
  compression: Compression,
): ValueCodec<V> {
  if (compression !== "zlib") {
    throw new ValidationError(`Unknown compression ${JSON.stringify(compression)}`);
  }

  return {
    name: `${codec.name}+${compression}`,
    encode: (value) => toUint8Array(deflateSync(codec.encode(value))),
    decode: (bytes) => {
      let inflated: Uint8Array;

      try {
        inflated = toUint8Array(inflateSync(bytes));
      } catch (err) {
        throw new ProtocolError("Stored value does not inflate", { cause: err });
      }

      return codec.decode(inflated);
    },
  };
}

function toUint8Array(buffer: Buffer): Uint8Array {
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}
