import * as v from "valibot";
import { invalid } from "./core/errors";
import type { Address } from "./core/types";

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

const lower = (a: Address): Address => `0x${a.slice(2).toLowerCase()}`;

export const addressSchema = v.pipe(
  v.custom<Address>(
    (input) => typeof input === "string" && ADDRESS_RE.test(input),
    "expected a 0x-prefixed 20-byte hex address",
  ),
  v.transform(lower),
);

export const isAddress = (input: unknown): input is Address =>
  v.is(addressSchema, input);

/** Accepts `0x…` of any case and returns the canonical lowercase form. */
export const parseAddress = (input: unknown): Address => v.parse(addressSchema, input);

/** Same canonical form, but a bad input is a `malformed-address` ledger error. */
export const canonicalAddress = (input: unknown): Address => {
  const parsed = v.safeParse(addressSchema, input);
  if (!parsed.success) throw invalid("malformed-address");
  return parsed.output;
};

export const amountSchema = v.pipe(
  v.string(),
  v.regex(/^\d+$/, "expected a non-negative integer"),
  v.transform((s) => BigInt(s)),
);

export const envSchema = v.object({
  LOG_LEVEL: v.optional(
    v.picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
    "info",
  ),
  LOG_PRETTY: v.optional(
    v.pipe(
      v.string(),
      v.transform((s) => s === "true" || s === "1"),
    ),
    "false",
  ),
  MIN_DEPOSIT: v.optional(amountSchema, "1000000000000000"),
});
