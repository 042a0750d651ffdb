export const DatabaseEvents = {
  TransactionCommit: "transactioncommit",
  TransactionAbort: "transactionabort",
} as const;

/** Emitted after a {@linkcode DbTransaction} has been committed, including commits with nothing to write. */
export class TransactionCommitEvent extends Event {
  constructor(
    readonly baseRevision: number,
    /** `null` when there was nothing to write. */
    readonly committedRevision: number | null,
    readonly puts: number,
    readonly deletes: number,
  ) {
    super(DatabaseEvents.TransactionCommit);
  }
}

/** Emitted after a {@linkcode DbTransaction} was rolled back, or its commit failed. */
export class TransactionAbortEvent extends Event {
  constructor(
    readonly baseRevision: number,
    /** The error that ended the scope, if there was one. */
    readonly reason: unknown,
  ) {
    super(DatabaseEvents.TransactionAbort);
  }
}
