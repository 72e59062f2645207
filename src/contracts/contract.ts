import { LedgerError } from "../core/errors";
import type { Runtime } from "../core/runtime";
import type { Address, CallContext, Contract, LedgerEvent } from "../core/types";
import type { ILogger } from "../logging";

/**
 * Shared plumbing for hosted contracts. `state` must be treated as
 * immutable: every change replaces it, which is what makes `checkpoint`
 * a plain reference copy.
 *
 * Entry points must be reached through `Runtime.invoke` or `Runtime.send`.
 * Only a runtime frame rolls back nested calls when one of them throws;
 * calling a method directly with a hand-made `ctx` gets no such rollback.
 */
export abstract class BaseContract<S> implements Contract {
  protected readonly log: ILogger;
  private entered = false;

  protected constructor(
    protected readonly runtime: Runtime,
    readonly address: Address,
    protected state: S,
  ) {
    this.log = runtime.log.child({ contract: address });
  }

  abstract receive(ctx: CallContext): void;
  abstract digest(): Uint8Array;

  checkpoint(): () => void {
    const saved = this.state;
    return () => {
      this.state = saved;
    };
  }

  /** In-progress guard for state-mutating entry points. */
  protected nonReentrant<T>(run: () => T): T {
    if (this.entered) throw new LedgerError("reentrancy", "reentrant-call");
    this.entered = true;
    try {
      return run();
    } finally {
      this.entered = false;
    }
  }

  protected emit(event: LedgerEvent): void {
    this.runtime.emit(this.address, event);
  }
}
