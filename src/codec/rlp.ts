// RLP field layouts for hashing ledger state and deriving addresses.

import { encode, type Input } from "rlp";
import type { AuthorityRole } from "../core/role";
import type { Leaderboard } from "../core/leaderboard";
import type { LedgerState } from "../core/ledger";
import type { Address } from "../core/types";

const byAddress = <T>([a]: [Address, T], [b]: [Address, T]) => (a < b ? -1 : a > b ? 1 : 0);

/* — ledger — [pooled, [[account, balance], …]] sorted by account */
export const ledgerFields = (st: LedgerState): Input => [
  st.pooled,
  [...st.balances.entries()].sort(byAddress).map(([a, b]) => [a, b]),
];

/* — leaderboard — identifiers in rank order */
export const boardFields = (board: Leaderboard): Input => [...board];

/* — role — */
export const roleFields = (role: AuthorityRole): Input => role.holder;

export const encodeFields = (fields: Input): Uint8Array => encode(fields);

/* — CREATE-style address input — */
export const encodeDeployment = (deployer: Address, nonce: bigint): Uint8Array =>
  encode([deployer, nonce]);
