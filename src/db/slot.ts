import { concat, fromString, toString } from "uint8arrays";
import { ProtocolError, ValidationError } from "../errors.ts";
import { prefixEnd, uint16ToBytes } from "../util/bytes.ts";
import { isJsonObject } from "../wire/decode.ts";
import type { DbTransaction } from "./transaction.ts";

/** Binds the stable identity of a map to the slot its entries are stored under. */
export type Slot = {
  oid: string;
  slot: number;
  name: string | null;
  description: string | null;
  tags: string[];
  creator: string | null;
};

export const MIN_SLOT = 1;
export const MAX_SLOT = 0xffff;

/** Slot 0 is the slot table itself: `\0\0 ++ uint16be(slot)` holds the {@linkcode Slot} record. */
export const SLOT_TABLE_PREFIX = uint16ToBytes(0);

export function checkSlot(slot: number): number {
  if (!Number.isInteger(slot) || slot < MIN_SLOT || slot > MAX_SLOT) {
    throw new ValidationError(
      `slot must be an integer between ${MIN_SLOT} and ${MAX_SLOT}, not ${slot}`,
    );
  }

  return slot;
}

export function slotKey(slot: number): Uint8Array {
  return concat([SLOT_TABLE_PREFIX, uint16ToBytes(checkSlot(slot))]);
}

export function encodeSlot(slot: Slot): Uint8Array {
  return fromString(JSON.stringify(slot), "utf8");
}

export function decodeSlot(bytes: Uint8Array): Slot {
  let json: unknown;

  try {
    json = JSON.parse(toString(bytes, "utf8"));
  } catch (err) {
    throw new ProtocolError("Slot record is not valid JSON", { cause: err });
  }

  if (!isJsonObject(json)) {
    throw new ProtocolError(`Bogus slot record ${JSON.stringify(json)}`);
  }

  const { oid, slot, name, description, tags, creator } = json;

  if (
    typeof oid !== "string" ||
    typeof slot !== "number" ||
    !Number.isInteger(slot) ||
    !nullableString(name) ||
    !nullableString(description) ||
    !nullableString(creator) ||
    !Array.isArray(tags) ||
    !tags.every((tag): tag is string => typeof tag === "string")
  ) {
    throw new ProtocolError(`Bogus slot record ${JSON.stringify(json)}`);
  }

  return { oid, slot, name, description, tags, creator };
}

function nullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

/** Every registered slot, in slot order. */
export async function readSlots(txn: DbTransaction): Promise<Slot[]> {
  const pairs = await txn.range(SLOT_TABLE_PREFIX, prefixEnd(SLOT_TABLE_PREFIX));

  return pairs.map((pair) => decodeSlot(pair.value));
}

export function writeSlot(txn: DbTransaction, slot: Slot) {
  txn.put(slotKey(slot.slot), encodeSlot(slot));
}

/** The lowest slot index not taken by `slots`, or `null` when all are. */
export function lowestFreeSlot(slots: Slot[]): number | null {
  const taken = new Set(slots.map((slot) => slot.slot));

  for (let slot = MIN_SLOT; slot <= MAX_SLOT; slot++) {
    if (!taken.has(slot)) {
      return slot;
    }
  }

  return null;
}
