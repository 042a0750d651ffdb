import { TransactionFailedError, ValidationError } from "./errors.ts";
import { type KeyArg, type KeyRange, toKeyRange } from "./key_range.ts";
import type { GetOpts, Header, TxnResponse } from "./types.ts";
import { assertBytes, encodeBase64 } from "./util/bytes.ts";
import {
  type DeleteRangeRequest,
  marshalDeleteRange,
  marshalPut,
  marshalRange,
  type PutRequest,
  type RangeRequest,
} from "./wire/encode.ts";

export const CompareOperators = {
  "==": "EQUAL",
  "!=": "NOT_EQUAL",
  ">": "GREATER",
  "<": "LESS",
} as const;

export type CompareOperator = keyof typeof CompareOperators;

type CompareSubject = {
  key: Uint8Array;
  operator: CompareOperator;
  /** Compare every key in `[key, rangeEnd)` rather than `key` alone. */
  rangeEnd?: Uint8Array;
};

/** A predicate on one key or a range of keys, evaluated by the store when a transaction is submitted. */
export type Comparator =
  & CompareSubject
  & (
    | { target: "value"; value: Uint8Array }
    | { target: "version"; version: number }
    | { target: "create"; createRevision: number }
    | { target: "mod"; modRevision: number }
  );

export type OpGet = { op: "get"; keys: KeyRange; opts: GetOpts };

export type OpSet = {
  op: "set";
  key: Uint8Array;
  value: Uint8Array;
  /** Lease id to attach the key to. */
  lease?: bigint;
  returnPrevious?: boolean;
};

export type OpDelete = { op: "delete"; keys: KeyRange; returnPrevious?: boolean };

/** A single operation within a transaction branch. */
export type Operation = OpGet | OpSet | OpDelete;

/**
 * An atomic compare-and-branch: if every comparator holds, `success` is executed,
 * otherwise `failure`. A key must not be mutated twice within one branch.
 */
export type Transaction = {
  compare: Comparator[];
  success: Operation[];
  failure: Operation[];
};

/** What {@linkcode Client.submit} returns. A failed compare is an outcome, not an error. */
export type SubmitOutcome =
  | { succeeded: true; header: Header; responses: TxnResponse[] }
  | { succeeded: false; header: Header; responses: TxnResponse[] };

function isCompareOperator(operator: string): operator is CompareOperator {
  return Object.hasOwn(CompareOperators, operator);
}

/** Validate an operator that arrived untyped, e.g. from configuration. */
export function toCompareOperator(operator: string): CompareOperator {
  if (!isCompareOperator(operator)) {
    throw new ValidationError(
      `compare must be one of ${Object.keys(CompareOperators).join(", ")}, not "${operator}"`,
    );
  }

  return operator;
}

function checkInteger(value: number, name: string): number {
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(`${name} must be an integer, not ${value}`);
  }

  return value;
}

export function compareValue(
  key: Uint8Array,
  operator: CompareOperator,
  value: Uint8Array,
): Comparator {
  assertBytes(key, "key");
  assertBytes(value, "value");

  return { key, operator: toCompareOperator(operator), target: "value", value };
}

export function compareVersion(
  key: Uint8Array,
  operator: CompareOperator,
  version: number,
): Comparator {
  assertBytes(key, "key");

  return {
    key,
    operator: toCompareOperator(operator),
    target: "version",
    version: checkInteger(version, "version"),
  };
}

export function compareCreated(
  key: Uint8Array,
  operator: CompareOperator,
  createRevision: number,
): Comparator {
  assertBytes(key, "key");

  return {
    key,
    operator: toCompareOperator(operator),
    target: "create",
    createRevision: checkInteger(createRevision, "createRevision"),
  };
}

/**
 * With `rangeEnd`, the store checks every key in `[key, rangeEnd)`. A
 * `rangeEnd` of `OPEN_END` runs to the end of the keyspace.
 */
export function compareModified(
  key: Uint8Array,
  operator: CompareOperator,
  modRevision: number,
  opts: { rangeEnd?: Uint8Array } = {},
): Comparator {
  assertBytes(key, "key");

  const comparator: Comparator = {
    key,
    operator: toCompareOperator(operator),
    target: "mod",
    modRevision: checkInteger(modRevision, "modRevision"),
  };

  if (opts.rangeEnd !== undefined) {
    assertBytes(opts.rangeEnd, "rangeEnd");
    comparator.rangeEnd = opts.rangeEnd;
  }

  return comparator;
}

const SORT_ORDERS: readonly string[] = ["NONE", "ASCEND", "DESCEND"];
const SORT_TARGETS: readonly string[] = [
  "KEY",
  "VERSION",
  "CREATE",
  "MOD",
  "VALUE",
];

/** Reject range options the gateway would not understand. */
export function checkGetOpts(opts: GetOpts): GetOpts {
  for (
    const field of [
      "limit",
      "revision",
      "minModRevision",
      "maxModRevision",
      "minCreateRevision",
      "maxCreateRevision",
    ] as const
  ) {
    const value = opts[field];

    if (value !== undefined && (!Number.isSafeInteger(value) || value < 0)) {
      throw new ValidationError(
        `${field} must be a non-negative integer, not ${value}`,
      );
    }
  }

  if (opts.sortOrder !== undefined && !SORT_ORDERS.includes(opts.sortOrder)) {
    throw new ValidationError(
      `sortOrder must be one of ${SORT_ORDERS.join(", ")}, not "${opts.sortOrder}"`,
    );
  }

  if (opts.sortTarget !== undefined && !SORT_TARGETS.includes(opts.sortTarget)) {
    throw new ValidationError(
      `sortTarget must be one of ${SORT_TARGETS.join(", ")}, not "${opts.sortTarget}"`,
    );
  }

  return opts;
}

export function opGet(keys: KeyArg, opts: GetOpts = {}): OpGet {
  return { op: "get", keys: toKeyRange(keys), opts: checkGetOpts(opts) };
}

export function opSet(
  key: Uint8Array,
  value: Uint8Array,
  opts: { lease?: { leaseId: bigint } | bigint; returnPrevious?: boolean } = {},
): OpSet {
  assertBytes(key, "key");
  assertBytes(value, "value");

  const op: OpSet = { op: "set", key, value };

  if (opts.lease !== undefined) {
    op.lease = typeof opts.lease === "bigint" ? opts.lease : opts.lease.leaseId;
  }

  if (opts.returnPrevious) {
    op.returnPrevious = true;
  }

  return op;
}

export function opDelete(
  keys: KeyArg,
  opts: { returnPrevious?: boolean } = {},
): OpDelete {
  const op: OpDelete = { op: "delete", keys: toKeyRange(keys) };

  if (opts.returnPrevious) {
    op.returnPrevious = true;
  }

  return op;
}

export function transaction(
  parts: {
    compare?: Comparator[];
    success?: Operation[];
    failure?: Operation[];
  } = {},
): Transaction {
  return {
    compare: parts.compare ?? [],
    success: parts.success ?? [],
    failure: parts.failure ?? [],
  };
}

/** Throw a {@linkcode TransactionFailedError} unless the compare branch was taken. */
export function assertSucceeded(
  outcome: SubmitOutcome,
): asserts outcome is Extract<SubmitOutcome, { succeeded: true }> {
  if (!outcome.succeeded) {
    throw new TransactionFailedError(outcome.header, outcome.responses);
  }
}

export type CompareRequest = {
  key: string;
  range_end?: string;
  result: typeof CompareOperators[CompareOperator];
  target: "VALUE" | "VERSION" | "CREATE" | "MOD";
  value?: string;
  version?: number;
  create_revision?: number;
  mod_revision?: number;
};

export type RequestOp =
  | { request_range: RangeRequest }
  | { request_put: PutRequest }
  | { request_delete_range: DeleteRangeRequest };

export type TxnRequest = {
  compare?: CompareRequest[];
  success?: RequestOp[];
  failure?: RequestOp[];
};

export function marshalComparator(comparator: Comparator): CompareRequest {
  const base: { key: string; range_end?: string; result: CompareRequest["result"] } = {
    key: encodeBase64(comparator.key),
    result: CompareOperators[comparator.operator],
  };

  if (comparator.rangeEnd !== undefined) {
    base.range_end = encodeBase64(comparator.rangeEnd);
  }

  switch (comparator.target) {
    case "value":
      return { ...base, target: "VALUE", value: encodeBase64(comparator.value) };
    case "version":
      return { ...base, target: "VERSION", version: comparator.version };
    case "create":
      return {
        ...base,
        target: "CREATE",
        create_revision: comparator.createRevision,
      };
    case "mod":
      return { ...base, target: "MOD", mod_revision: comparator.modRevision };
  }
}

export function marshalOperation(operation: Operation): RequestOp {
  switch (operation.op) {
    case "get":
      return { request_range: marshalRange(operation.keys, operation.opts) };
    case "set":
      return {
        request_put: marshalPut(operation.key, operation.value, {
          lease: operation.lease,
          prevKv: operation.returnPrevious,
        }),
      };
    case "delete":
      return {
        request_delete_range: marshalDeleteRange(operation.keys, {
          prevKv: operation.returnPrevious,
        }),
      };
  }
}

export function marshalTransaction(txn: Transaction): TxnRequest {
  const req: TxnRequest = {};

  if (txn.compare.length > 0) {
    req.compare = txn.compare.map(marshalComparator);
  }

  if (txn.success.length > 0) {
    req.success = txn.success.map(marshalOperation);
  }

  if (txn.failure.length > 0) {
    req.failure = txn.failure.map(marshalOperation);
  }

  return req;
}
