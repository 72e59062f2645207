import type { Config } from "../config";
import { invalid } from "./errors";

/** Supplies the deposit floor. Evaluated on every deposit. */
export type MinimumDepositPolicy = () => bigint;

export const unrestricted: MinimumDepositPolicy = () => 0n;

export const fixedMinimum = (floor: bigint): MinimumDepositPolicy => {
  if (floor < 0n) throw invalid("negative-minimum");
  return () => floor;
};

export const minimumFromConfig = (cfg: Config): MinimumDepositPolicy =>
  cfg.minimumDeposit > 0n ? fixedMinimum(cfg.minimumDeposit) : unrestricted;
