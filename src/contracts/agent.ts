import { encodeFields, roleFields } from "../codec/rlp";
import { LedgerError, insufficient, invalid, unauthorized } from "../core/errors";
import { keccak } from "../core/hash";
import { type AuthorityRole, createRole, requireHolder, transferRole } from "../core/role";
import type { Runtime } from "../core/runtime";
import { isAddress, parseAddress } from "../schema";
import type { Address, CallContext, Contract } from "../core/types";
import { BaseContract } from "./contract";

/**
 * What the agent needs from a ledger it controls. Both reads are taken at
 * face value only as preconditions; the result of `withdraw` is judged by
 * the agent's own balance afterwards.
 */
export interface WithdrawableLedger extends Contract {
  getPooledBalance(): bigint;
  getAuthority(): Address;
  withdraw(ctx: CallContext, amount: bigint): void;
}

export interface AgentState {
  readonly owner: AuthorityRole;
}

export class Agent extends BaseContract<AgentState> {
  constructor(runtime: Runtime, address: Address, owner: Address) {
    super(runtime, address, { owner: createRole(owner) });
  }

  static deploy(runtime: Runtime, deployer: Address): Agent {
    return runtime.deploy(deployer, (address) => new Agent(runtime, address, deployer));
  }

  receive(ctx: CallContext): void {
    if (ctx.value > 0n) this.emit({ type: "FundsReceived", from: ctx.sender, amount: ctx.value });
  }

  /* ── delegated withdrawal ──────────────────────────────── */
  adminWithdraw(ctx: CallContext, target: WithdrawableLedger, amount: bigint): void {
    this.nonReentrant(() => {
      requireHolder(this.state.owner, ctx.sender);
      if (amount <= 0n) throw invalid("amount-not-positive");
      this.pull(target, amount);
    });
  }

  /**
   * Targets the agent does not control, and targets with nothing to give,
   * are skipped. Requests above a target's balance are clamped. Any failure
   * on an attempted target aborts the whole batch.
   */
  batchAdminWithdraw(
    ctx: CallContext,
    targets: readonly WithdrawableLedger[],
    amounts: readonly bigint[],
  ): void {
    this.nonReentrant(() => {
      requireHolder(this.state.owner, ctx.sender);
      if (targets.length !== amounts.length) throw invalid("length-mismatch");
      if (amounts.some((a) => a < 0n)) throw invalid("amount-negative");

      targets.forEach((target, i) => {
        if (!this.isAuthorityOf(target)) return;
        const available = target.getPooledBalance();
        const amount = amounts[i] < available ? amounts[i] : available;
        if (amount === 0n) return;
        this.pull(target, amount);
      });
    });
  }

  /* ── owner drains ──────────────────────────────────────── */
  withdrawToOwner(ctx: CallContext, amount: bigint): void {
    this.nonReentrant(() => {
      requireHolder(this.state.owner, ctx.sender);
      if (amount <= 0n) throw invalid("amount-not-positive");
      if (amount > this.runtime.balanceOf(this.address)) throw insufficient("insufficient-funds");
      this.log.info({ amount: amount.toString() }, "withdrawn to owner");
      this.runtime.transfer(this.address, this.state.owner.holder, amount);
    });
  }

  emergencyWithdrawAll(ctx: CallContext): void {
    this.nonReentrant(() => {
      requireHolder(this.state.owner, ctx.sender);
      const all = this.runtime.balanceOf(this.address);
      if (all === 0n) throw insufficient("nothing-to-withdraw");
      this.log.warn({ amount: all.toString() }, "emergency withdrawal");
      this.runtime.transfer(this.address, this.state.owner.holder, all);
    });
  }

  transferOwnership(ctx: CallContext, next: Address): void {
    this.nonReentrant(() => {
      const previous = this.state.owner.holder;
      const owner = transferRole(this.state.owner, ctx.sender, next);
      this.state = { owner };
      this.emit({ type: "OwnershipTransferred", previous, current: owner.holder });
    });
  }

  /* ── views ─────────────────────────────────────────────── */
  getOwner(): Address {
    return this.state.owner.holder;
  }

  isAuthorityOf(target: WithdrawableLedger): boolean {
    const authority = target.getAuthority();
    return isAddress(authority) && parseAddress(authority) === this.address;
  }

  getWithdrawableBalance(target: WithdrawableLedger): bigint {
    return this.isAuthorityOf(target) ? target.getPooledBalance() : 0n;
  }

  digest(): Uint8Array {
    return keccak(encodeFields([roleFields(this.state.owner)]));
  }

  /* ── protocol ──────────────────────────────────────────── */

  // Authority is re-read on every call, never cached. The balance delta is
  // the only trusted measure of what arrived.
  private pull(target: WithdrawableLedger, amount: bigint): void {
    if (amount > target.getPooledBalance()) throw insufficient("insufficient-target-balance");
    if (!this.isAuthorityOf(target)) throw unauthorized("not-target-authority");

    const before = this.runtime.balanceOf(this.address);
    this.runtime.invoke(this.address, target, (call) => target.withdraw(call, amount));
    const received = this.runtime.balanceOf(this.address) - before;

    if (received < amount) throw new LedgerError("reconciliation", "short-delivery");
    this.emit({ type: "FundsWithdrawn", target: target.address, amount: received });
  }
}
