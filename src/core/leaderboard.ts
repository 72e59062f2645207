import { ZERO_ADDRESS, type Address } from "./types";

export const LEADERBOARD_SIZE = 3;

/** Filled slots only, best first. Never holds amounts. */
export type Leaderboard = readonly Address[];
export type BalanceReader = (account: Address) => bigint;

export interface Standings {
  readonly accounts: readonly Address[];
  readonly amounts: readonly bigint[];
}

// Descending by live balance. Array#sort is stable, so equal balances keep
// their current order: the incumbent stays ahead.
const resort = (board: Leaderboard, balanceOf: BalanceReader): Leaderboard =>
  [...board].sort((a, b) => {
    const x = balanceOf(a);
    const y = balanceOf(b);
    return x === y ? 0 : x > y ? -1 : 1;
  });

/**
 * Re-rank after `account` deposited. `balanceOf` must already reflect the
 * deposit.
 *
 * A ranked account triggers a full re-sort. A newcomer takes the first empty
 * slot (behind everyone) and then re-sorts; on a full board it displaces the
 * first entry with a strictly smaller balance and the last entry falls off.
 */
export const updateLeaderboard = (
  board: Leaderboard,
  account: Address,
  balanceOf: BalanceReader,
): Leaderboard => {
  const amount = balanceOf(account);
  if (account === ZERO_ADDRESS || amount === 0n) return board;

  if (board.includes(account)) return resort(board, balanceOf);
  if (board.length < LEADERBOARD_SIZE) return resort([...board, account], balanceOf);

  const at = board.findIndex((entry) => balanceOf(entry) < amount);
  if (at === -1) return board;
  return [...board.slice(0, at), account, ...board.slice(at, LEADERBOARD_SIZE - 1)];
};

/** 1-based rank, 0 when unranked. */
export const rankOf = (board: Leaderboard, account: Address): number =>
  board.indexOf(account) + 1;

export const standings = (board: Leaderboard, balanceOf: BalanceReader): Standings => {
  const accounts = Array.from({ length: LEADERBOARD_SIZE }, (_, i) =>
    i < board.length ? board[i] : ZERO_ADDRESS,
  );
  return {
    accounts,
    amounts: accounts.map((a) => (a === ZERO_ADDRESS ? 0n : balanceOf(a))),
  };
};
