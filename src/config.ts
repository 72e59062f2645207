import type pino from "pino";
import * as v from "valibot";
import { envSchema } from "./schema";

export interface Config {
  readonly logLevel: pino.LevelWithSilent;
  readonly logPretty: boolean;
  /** Floor applied by the enforced deposit policy; 0 disables it. */
  readonly minimumDeposit: bigint;
}

export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): Config => {
  const parsed = v.parse(envSchema, env);
  return {
    logLevel: parsed.LOG_LEVEL,
    logPretty: parsed.LOG_PRETTY,
    minimumDeposit: parsed.MIN_DEPOSIT,
  };
};
