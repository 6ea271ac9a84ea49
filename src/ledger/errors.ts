export type LedgerErrorKind = 'store-open' | 'transaction' | 'decode' | 'closed';

/** Base class for everything the ledger throws. The underlying error is kept as `cause`. */
export class LedgerError extends Error {
  readonly kind: LedgerErrorKind;

  constructor(kind: LedgerErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerError';
    this.kind = kind;
  }
}

/** The store file could not be opened or its schema could not be applied. */
export class StoreOpenError extends LedgerError {
  readonly storePath: string;

  constructor(storePath: string, cause: unknown) {
    super('store-open', `Failed to open playtime store at ${storePath}: ${describe(cause)}`, { cause });
    this.name = 'StoreOpenError';
    this.storePath = storePath;
  }
}

/** A merge or query transaction failed and was rolled back. */
export class LedgerTransactionError extends LedgerError {
  constructor(operation: string, cause: unknown) {
    super('transaction', `Ledger ${operation} failed: ${describe(cause)}`, { cause });
    this.name = 'LedgerTransactionError';
  }
}

/** A stored value is not a well-formed varint. */
export class LedgerDecodeError extends LedgerError {
  readonly reason: string;
  identity?: string;
  activity?: string;

  constructor(reason: string) {
    super('decode', `Corrupt ledger value: ${reason}`);
    this.name = 'LedgerDecodeError';
    this.reason = reason;
  }

  /** Attach the entry location once the caller knows which key it was reading. */
  at(identity: string, activity: string): this {
    this.identity = identity;
    this.activity = activity;
    this.message = `Corrupt ledger value for ${identity}/${activity}: ${this.reason}`;
    return this;
  }
}

export class LedgerClosedError extends LedgerError {
  constructor() {
    super('closed', 'Ledger is closed');
    this.name = 'LedgerClosedError';
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
