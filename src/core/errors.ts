export type ErrorKind =
  | "validation"
  | "authorization"
  | "insufficiency"
  | "reconciliation"
  | "transport"
  | "reentrancy";

/**
 * Every rejection in the ledger, the agent and the runtime. The message is a
 * short kebab-case code; `kind` says which family it belongs to.
 */
export class LedgerError extends Error {
  override readonly name = "LedgerError";

  constructor(
    readonly kind: ErrorKind,
    code: string,
    options?: ErrorOptions,
  ) {
    super(code, options);
  }

  get code(): string {
    return this.message;
  }
}

export const invalid = (code: string) => new LedgerError("validation", code);
export const unauthorized = (code: string) => new LedgerError("authorization", code);
export const insufficient = (code: string) => new LedgerError("insufficiency", code);
