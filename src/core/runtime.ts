import { loadConfig } from "../config";
import { type ILogger, makeLogger } from "../logging";
import { canonicalAddress } from "../schema";
import { LedgerError, insufficient, invalid } from "./errors";
import { computeStateRoot, contractAddress } from "./hash";
import type { Address, CallContext, Contract, Hex, LedgerEvent, LogEntry } from "./types";

/* ──────────── runtime shell ──────────── */
export class Runtime {
  private balances = new Map<Address, bigint>();
  private contracts = new Map<Address, Contract>();
  private nonces = new Map<Address, bigint>();
  private events: LogEntry[] = [];
  readonly log: ILogger;

  constructor(opts: { logger?: ILogger } = {}) {
    if (opts.logger) {
      this.log = opts.logger;
    } else {
      const cfg = loadConfig();
      this.log = makeLogger(cfg.logLevel, cfg.logPretty);
    }
  }

  /* ── reads ─────────────────────────────────────────────── */
  balanceOf(account: Address): bigint {
    return this.balances.get(canonicalAddress(account)) ?? 0n;
  }

  isContract(account: Address): boolean {
    return this.contracts.has(canonicalAddress(account));
  }

  logs(): readonly LogEntry[] {
    return [...this.events];
  }

  stateRoot(): Hex {
    return computeStateRoot(this.balances, this.contracts);
  }

  /* ── genesis / deployment ──────────────────────────────── */
  fund(to: Address, amount: bigint): void {
    const account = canonicalAddress(to);
    if (amount <= 0n) throw invalid("amount-not-positive");
    if (this.isContract(account)) throw invalid("fund-contract");
    this.balances.set(account, this.balanceOf(account) + amount);
    this.log.info({ account, amount: amount.toString() }, "funded");
  }

  deploy<C extends Contract>(by: Address, build: (address: Address) => C): C {
    const deployer = canonicalAddress(by);
    return this.frame(() => {
      const nonce = this.nonces.get(deployer) ?? 0n;
      const address = contractAddress(deployer, nonce);
      const contract = build(address);
      if (contract.address !== address) throw invalid("address-mismatch");
      this.nonces.set(deployer, nonce + 1n);
      this.contracts.set(address, contract);
      this.log.debug({ deployer, address }, "deployed");
      return contract;
    });
  }

  /* ── calls ─────────────────────────────────────────────── */
  // Addresses are canonicalised on the way in, so map keys and every
  // `ctx.sender` handed to a contract are lowercase.

  /** Top-level value transfer; a contract recipient runs its receive hook. */
  send(from: Address, to: Address, value: bigint): void {
    this.frame(() => this.deliver(canonicalAddress(from), canonicalAddress(to), value));
  }

  invoke<T>(sender: Address, target: Contract, call: (ctx: CallContext) => T): T {
    return this.frame(() => {
      if (this.contracts.get(target.address) !== target) throw invalid("unknown-contract");
      return call({ sender: canonicalAddress(sender), value: 0n });
    });
  }

  /**
   * Pay-out path for contracts. Whatever goes wrong underneath is reported
   * as one `transport` failure; the underlying error rides along as `cause`.
   */
  transfer(from: Address, to: Address, amount: bigint): void {
    try {
      this.frame(() => this.deliver(canonicalAddress(from), canonicalAddress(to), amount));
    } catch (cause) {
      throw new LedgerError("transport", "transfer-failed", { cause });
    }
  }

  emit(emitter: Address, event: LedgerEvent): void {
    this.events.push({ emitter, event });
    this.log.debug({ emitter, event: event.type }, "event");
  }

  /* ── internals ─────────────────────────────────────────── */
  private deliver(from: Address, to: Address, value: bigint): void {
    if (value < 0n) throw invalid("negative-value");
    const have = this.balanceOf(from);
    if (have < value) throw insufficient("insufficient-funds");
    if (from !== to) {
      this.balances.set(from, have - value);
      this.balances.set(to, this.balanceOf(to) + value);
    }
    this.contracts.get(to)?.receive({ sender: from, value });
  }

  // All-or-nothing: on throw every balance, registration, nonce, log entry
  // and contract state touched inside `run` is put back.
  private frame<T>(run: () => T): T {
    const balances = new Map(this.balances);
    const contracts = new Map(this.contracts);
    const nonces = new Map(this.nonces);
    const logLength = this.events.length;
    const undo = [...this.contracts.values()].map((c) => c.checkpoint());
    try {
      return run();
    } catch (err) {
      this.balances = balances;
      this.contracts = contracts;
      this.nonces = nonces;
      this.events = this.events.slice(0, logLength);
      undo.forEach((restore) => restore());
      this.log.debug(
        { code: err instanceof Error ? err.message : String(err) },
        "frame reverted",
      );
      throw err;
    }
  }
}
