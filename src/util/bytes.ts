import { fromString, toString } from "uint8arrays";
import { ProtocolError, ValidationError } from "../errors.ts";

export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const shorter = a.byteLength < b.byteLength ? a : b;

  for (let i = 0; i < shorter.byteLength; i++) {
    const aByte = a[i];
    const bByte = b[i];

    if (aByte === bByte) {
      continue;
    }

    if (aByte < bByte) {
      return -1;
    }

    if (aByte > bByte) {
      return 1;
    }
  }

  if (a.byteLength < b.byteLength) {
    return -1;
  } else if (a.byteLength > b.byteLength) {
    return 1;
  }

  return 0;
}

export function bigintToBytes(bigint: bigint): Uint8Array {
  const bytes = new Uint8Array(8);
  const view = new DataView(bytes.buffer);

  view.setBigUint64(0, bigint);

  return bytes;
}

export function bytesToBigint(bytes: Uint8Array): bigint {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  return view.getBigUint64(0);
}

export function uint16ToBytes(n: number): Uint8Array {
  const bytes = new Uint8Array(2);
  const view = new DataView(bytes.buffer);

  view.setUint16(0, n);

  return bytes;
}

export function bytesToUint16(bytes: Uint8Array): number {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  return view.getUint16(0);
}

/** The range end that, paired with the gateway's "range_end", selects every key >= the start key. */
export const OPEN_END = new Uint8Array([0]);

/**
 * The least byte string greater than every string prefixed by `bytes`.
 *
 * Trailing `0xff` bytes cannot be incremented, so they are dropped first. If nothing is left
 * (`bytes` is empty or all `0xff`) there is no such string and {@linkcode OPEN_END} is returned.
 */
export function prefixEnd(bytes: Uint8Array): Uint8Array {
  for (let i = bytes.byteLength - 1; i >= 0; i--) {
    if (bytes[i] < 0xff) {
      const newBytes = bytes.slice(0, i + 1);

      newBytes[i] = bytes[i] + 1;

      return newBytes;
    }
  }

  return OPEN_END;
}

export function encodeBase64(bytes: Uint8Array): string {
  return toString(bytes, "base64pad");
}

export function decodeBase64(text: string): Uint8Array {
  try {
    return fromString(text, "base64pad");
  } catch (err) {
    throw new ProtocolError(`Not valid base64: ${JSON.stringify(text)}`, {
      cause: err,
    });
  }
}

/** A readable rendering of a key for log lines: the text if it is printable ASCII, hex otherwise. */
export function displayBytes(bytes: Uint8Array): string {
  for (const byte of bytes) {
    if (byte < 0x20 || byte > 0x7e) {
      return `0x${toString(bytes, "base16")}`;
    }
  }

  return toString(bytes, "utf8");
}

export function assertBytes(
  value: unknown,
  name: string,
): asserts value is Uint8Array {
  if (!(value instanceof Uint8Array)) {
    throw new ValidationError(
      `${name} must be a Uint8Array, not ${describeType(value)}`,
    );
  }
}

export function describeType(value: unknown): string {
  if (value === null) {
    return "null";
  }

  if (Array.isArray(value)) {
    return "array";
  }

  if (typeof value === "object") {
    return value.constructor?.name ?? "object";
  }

  return typeof value;
}
