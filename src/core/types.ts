/* ── primitives ──────────────────────────────────────────── */
export type Hex = `0x${string}`;
export type Address = Hex;

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/* ── call envelope ───────────────────────────────────────── */
export interface CallContext {
  readonly sender: Address;
  readonly value: bigint; // native value delivered with the call
}

/* ── events ──────────────────────────────────────────────── */
export type LedgerEvent =
  | { type: "Deposited"; account: Address; amount: bigint }
  | { type: "Withdrawn"; authority: Address; amount: bigint }
  | { type: "AuthorityTransferred"; previous: Address; current: Address }
  | { type: "FundsWithdrawn"; target: Address; amount: bigint }
  | { type: "FundsReceived"; from: Address; amount: bigint }
  | { type: "OwnershipTransferred"; previous: Address; current: Address };

export interface LogEntry {
  readonly emitter: Address;
  readonly event: LedgerEvent;
}

/* ── anything the runtime can host ───────────────────────── */
export interface Contract {
  readonly address: Address;
  receive(ctx: CallContext): void;
  /** Captures current state; calling the result puts it back. */
  checkpoint(): () => void;
  digest(): Uint8Array;
}
