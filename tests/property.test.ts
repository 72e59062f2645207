import { describe, it } from "vitest";
import fc from "fast-check";
import { computeStateRoot } from "../src/core/hash";
import { LEADERBOARD_SIZE, type Leaderboard, updateLeaderboard } from "../src/core/leaderboard";
import { type LedgerState, balanceOf, credit, emptyLedger } from "../src/core/ledger";
import type { Address, Contract } from "../src/core/types";
import { acct } from "./helpers/accounts";

const accounts = [1, 2, 3, 4, 5, 6].map(acct);

const deposit = fc.tuple(
  fc.constantFrom(...accounts),
  fc.bigInt({ min: 1n, max: 20n }),
);

const replay = (deposits: [Address, bigint][]) => {
  let ledger: LedgerState = emptyLedger();
  let board: Leaderboard = [];
  for (const [account, amount] of deposits) {
    ledger = credit(ledger, account, amount);
    const st = ledger;
    board = updateLeaderboard(board, account, (a) => balanceOf(st, a));
  }
  return { ledger, board };
};

describe("Property-based tests", () => {
  describe("Leaderboard invariants", () => {
    it("holds at most three distinct, non-increasing entries", () => {
      fc.assert(
        fc.property(fc.array(deposit, { maxLength: 40 }), (deposits) => {
          const { ledger, board } = replay(deposits);
          const amounts = board.map((a) => balanceOf(ledger, a));

          if (board.length > LEADERBOARD_SIZE) return false;
          if (new Set(board).size !== board.length) return false;
          if (amounts.some((x) => x === 0n)) return false;
          return amounts.every((x, i) => i === 0 || amounts[i - 1] >= x);
        }),
      );
    });

    it("no unranked account outranks the last entry of a full board", () => {
      fc.assert(
        fc.property(fc.array(deposit, { maxLength: 40 }), (deposits) => {
          const { ledger, board } = replay(deposits);
          if (board.length < LEADERBOARD_SIZE) return true;
          const floor = balanceOf(ledger, board[board.length - 1]);
          return [...ledger.balances.keys()]
            .filter((a) => !board.includes(a))
            .every((a) => balanceOf(ledger, a) <= floor);
        }),
      );
    });

    it("carries the same balances as the true top three", () => {
      fc.assert(
        fc.property(fc.array(deposit, { maxLength: 40 }), (deposits) => {
          const { ledger, board } = replay(deposits);
          const expected = [...ledger.balances.values()]
            .sort((a, b) => (a === b ? 0 : a > b ? -1 : 1))
            .slice(0, LEADERBOARD_SIZE);
          const actual = board.map((a) => balanceOf(ledger, a));
          return (
            actual.length === expected.length && actual.every((x, i) => x === expected[i])
          );
        }),
      );
    });

    it("pool equals the sum of contributions when nothing was withdrawn", () => {
      fc.assert(
        fc.property(fc.array(deposit, { maxLength: 40 }), (deposits) => {
          const { ledger } = replay(deposits);
          const sum = [...ledger.balances.values()].reduce((t, x) => t + x, 0n);
          return sum === ledger.pooled;
        }),
      );
    });
  });

  describe("State root determinism", () => {
    it("does not depend on insertion order", () => {
      fc.assert(
        fc.property(
          fc.array(fc.tuple(fc.constantFrom(...accounts), fc.bigInt({ min: 0n, max: 1000n })), {
            minLength: 1,
            maxLength: 6,
          }),
          (entries) => {
            const forward = new Map(entries);
            const backward = new Map([...forward.entries()].reverse());
            const none = new Map<Address, Contract>();
            return computeStateRoot(forward, none) === computeStateRoot(backward, none);
          },
        ),
      );
    });
  });
});
