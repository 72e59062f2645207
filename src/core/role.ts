import { canonicalAddress } from "../schema";
import { invalid, unauthorized } from "./errors";
import { ZERO_ADDRESS, type Address } from "./types";

export interface AuthorityRole {
  readonly holder: Address;
}

const checkHolder = (next: Address): Address => {
  const holder = canonicalAddress(next);
  if (holder === ZERO_ADDRESS) throw invalid("zero-address");
  return holder;
};

export const createRole = (holder: Address): AuthorityRole => ({ holder: checkHolder(holder) });

export const requireHolder = (role: AuthorityRole, caller: Address): void => {
  if (caller !== role.holder) throw unauthorized("not-authority");
};

/* single step: a wrong `next` locks the role for good */
export const transferRole = (
  role: AuthorityRole,
  caller: Address,
  next: Address,
): AuthorityRole => {
  requireHolder(role, caller);
  const holder = checkHolder(next);
  if (holder === role.holder) throw invalid("same-holder");
  return { holder };
};
