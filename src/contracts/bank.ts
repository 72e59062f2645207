import { encodeFields, boardFields, ledgerFields, roleFields } from "../codec/rlp";
import { invalid } from "../core/errors";
import { keccak } from "../core/hash";
import {
  type Leaderboard,
  type Standings,
  rankOf,
  standings,
  updateLeaderboard,
} from "../core/leaderboard";
import { type LedgerState, balanceOf, credit, debitPool, emptyLedger } from "../core/ledger";
import { type MinimumDepositPolicy, unrestricted } from "../core/policy";
import { type AuthorityRole, createRole, requireHolder, transferRole } from "../core/role";
import type { Runtime } from "../core/runtime";
import { canonicalAddress } from "../schema";
import type { Address, CallContext } from "../core/types";
import { BaseContract } from "./contract";

export interface BankState {
  readonly ledger: LedgerState;
  readonly board: Leaderboard;
  readonly authority: AuthorityRole;
}

export interface BankOptions {
  /** Defaults to `unrestricted`. */
  minimumDeposit?: MinimumDepositPolicy;
}

/**
 * Custodial pool with a top-3 depositor board. Anyone deposits by sending
 * value; only the authority holder withdraws, and withdrawals drain the pool
 * without touching per-account records.
 */
export class Bank extends BaseContract<BankState> {
  private readonly minimumDeposit: MinimumDepositPolicy;

  constructor(runtime: Runtime, address: Address, authority: Address, opts: BankOptions = {}) {
    super(runtime, address, {
      ledger: emptyLedger(),
      board: [],
      authority: createRole(authority),
    });
    this.minimumDeposit = opts.minimumDeposit ?? unrestricted;
  }

  static deploy(runtime: Runtime, deployer: Address, opts: BankOptions = {}): Bank {
    return runtime.deploy(deployer, (address) => new Bank(runtime, address, deployer, opts));
  }

  /* ── mutations ─────────────────────────────────────────── */
  receive(ctx: CallContext): void {
    this.deposit(ctx);
  }

  deposit(ctx: CallContext): void {
    this.nonReentrant(() => {
      if (ctx.value <= 0n) throw invalid("amount-not-positive");
      if (ctx.value < this.minimumDeposit()) throw invalid("below-minimum-deposit");
      const ledger = credit(this.state.ledger, ctx.sender, ctx.value);
      const board = updateLeaderboard(this.state.board, ctx.sender, (a) => balanceOf(ledger, a));
      this.state = { ...this.state, ledger, board };
      this.emit({ type: "Deposited", account: ctx.sender, amount: ctx.value });
    });
  }

  withdraw(ctx: CallContext, amount: bigint): void {
    this.nonReentrant(() => {
      requireHolder(this.state.authority, ctx.sender);
      this.state = { ...this.state, ledger: debitPool(this.state.ledger, amount) };
      this.emit({ type: "Withdrawn", authority: ctx.sender, amount });
      this.log.info({ authority: ctx.sender, amount: amount.toString() }, "pool withdrawn");
      this.runtime.transfer(this.address, ctx.sender, amount);
    });
  }

  transferAuthority(ctx: CallContext, next: Address): void {
    this.nonReentrant(() => {
      const previous = this.state.authority.holder;
      const authority = transferRole(this.state.authority, ctx.sender, next);
      this.state = { ...this.state, authority };
      this.emit({ type: "AuthorityTransferred", previous, current: authority.holder });
    });
  }

  /* ── views ─────────────────────────────────────────────── */
  getPooledBalance(): bigint {
    return this.state.ledger.pooled;
  }

  getAuthority(): Address {
    return this.state.authority.holder;
  }

  balanceOf(account: Address): bigint {
    return balanceOf(this.state.ledger, canonicalAddress(account));
  }

  getLeaderboard(): Standings {
    return standings(this.state.board, (a) => this.balanceOf(a));
  }

  getRank(account: Address): number {
    return rankOf(this.state.board, canonicalAddress(account));
  }

  getMinimumDeposit(): bigint {
    return this.minimumDeposit();
  }

  digest(): Uint8Array {
    return keccak(
      encodeFields([
        ledgerFields(this.state.ledger),
        boardFields(this.state.board),
        roleFields(this.state.authority),
      ]),
    );
  }
}
