import type { Header, TxnResponse } from "./types.ts";

/** Generic top-level error class that all other client errors inherit from. */
export class ClientError extends Error {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(message || "", options);
    this.name = "ClientError";
  }
}

/** An argument had the wrong type or shape. Thrown before anything is sent. */
export class ValidationError extends ClientError {
  constructor(message?: string) {
    super(message || "Validation error");
    this.name = "ValidationError";
  }
}

/** The gateway answered with something this client cannot make sense of. */
export class ProtocolError extends ClientError {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(message || "Protocol error", options);
    this.name = "ProtocolError";
  }
}

/** The request never produced a response: the connection failed, or the call timed out or was aborted. */
export class TransportError extends ClientError {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(message || "Transport error", options);
    this.name = "TransportError";
  }
}

/** The store rejected a request and said why, e.g. `{ code: 3, error: "etcdserver: duplicate key given in txn request" }`. */
export class StoreError extends ProtocolError {
  readonly code: number;

  constructor(code: number, message: string) {
    super(message || `Store error ${code}`);
    this.name = "StoreError";
    this.code = code;
  }
}

/** Thrown by {@linkcode assertSucceeded} when the compare branch of a transaction evaluated to false. */
export class TransactionFailedError extends ClientError {
  constructor(
    readonly header: Header,
    readonly responses: TxnResponse[],
  ) {
    super(`Transaction failed at revision ${header.revision}`);
    this.name = "TransactionFailedError";
  }
}

/** Another writer modified a key this transaction depends on after it began. Nothing was applied. */
export class TransactionConflictError extends ClientError {
  constructor(
    readonly baseRevision: number,
    readonly keys: Uint8Array[],
  ) {
    super(
      `Transaction begun at revision ${baseRevision} conflicts with a later write`,
    );
    this.name = "TransactionConflictError";
  }
}

/** The lease has run out or was revoked. Terminal for the lease object. */
export class LeaseExpiredError extends ClientError {
  constructor(readonly leaseId: bigint) {
    super(`Lease ${leaseId} expired`);
    this.name = "LeaseExpiredError";
  }
}

/** A watch stream ended without having been cancelled locally. */
export class WatchClosedError extends ClientError {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(message || "Watch stream closed", options);
    this.name = "WatchClosedError";
  }
}

/** Check if any value is a subclass of ClientError (return true) or not (return false) */
export function isErr<T>(x: T | Error): x is ClientError {
  return x instanceof ClientError;
}

/** Check if any value is a subclass of ClientError (return false) or not (return true) */
export function notErr<T>(x: T | Error): x is T {
  return !(x instanceof ClientError);
}
