import { insufficient, invalid } from "./errors";
import type { Address } from "./types";

export const MAX_AMOUNT = 2n ** 256n - 1n;

/**
 * Contribution record plus the pooled total. Balances only ever grow;
 * withdrawals drain `pooled` and are not attributed to any account, so an
 * account's recorded balance is not a claim on the pool.
 */
export interface LedgerState {
  readonly balances: ReadonlyMap<Address, bigint>;
  readonly pooled: bigint;
}

export const emptyLedger = (): LedgerState => ({ balances: new Map(), pooled: 0n });

export const balanceOf = (st: LedgerState, account: Address): bigint =>
  st.balances.get(account) ?? 0n;

export const credit = (st: LedgerState, account: Address, amount: bigint): LedgerState => {
  if (amount <= 0n) throw invalid("amount-not-positive");
  const next = balanceOf(st, account) + amount;
  const pooled = st.pooled + amount;
  if (next > MAX_AMOUNT || pooled > MAX_AMOUNT) throw invalid("amount-overflow");

  const balances = new Map(st.balances);
  balances.set(account, next);
  return { balances, pooled };
};

export const debitPool = (st: LedgerState, amount: bigint): LedgerState => {
  if (amount <= 0n) throw invalid("amount-not-positive");
  if (amount > st.pooled) throw insufficient("insufficient-pool");
  return { ...st, pooled: st.pooled - amount };
};
