export * from "./core/types";
export * from "./core/errors";
export * from "./core/ledger";
export * from "./core/leaderboard";
export * from "./core/role";
export * from "./core/policy";
export { Runtime } from "./core/runtime";
export { computeStateRoot, contractAddress } from "./core/hash";
export { BaseContract } from "./contracts/contract";
export { Bank, type BankOptions, type BankState } from "./contracts/bank";
export { Agent, type AgentState, type WithdrawableLedger } from "./contracts/agent";
export { type Config, loadConfig } from "./config";
export { type ILogger, makeLogger } from "./logging";
export { canonicalAddress, isAddress, parseAddress } from "./schema";
