import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, concatBytes } from "@noble/hashes/utils";
import { encode } from "rlp";
import { encodeDeployment } from "../codec/rlp";
import type { Address, Contract, Hex } from "./types";

export const keccak = (b: Uint8Array): Uint8Array => keccak_256(b);

export const toHex = (b: Uint8Array): Hex => `0x${bytesToHex(b)}`;

/* ── Merkle helper (odd leaf is paired with itself) ──────── */
export const merkle = (leaves: Uint8Array[]): Uint8Array => {
  if (leaves.length === 0) return keccak(new Uint8Array());
  if (leaves.length === 1) return leaves[0];
  const next: Uint8Array[] = [];
  for (let i = 0; i < leaves.length; i += 2) {
    const left = leaves[i];
    const right = i + 1 < leaves.length ? leaves[i + 1] : left;
    next.push(keccak(concatBytes(left, right)));
  }
  return merkle(next);
};

/* ── deterministic contract address ──────────────────────── */
export const contractAddress = (deployer: Address, nonce: bigint): Address =>
  `0x${bytesToHex(keccak(encodeDeployment(deployer, nonce))).slice(-40)}`;

/* ── world root: one leaf per address, sorted ────────────── */
export const computeStateRoot = (
  balances: ReadonlyMap<Address, bigint>,
  contracts: ReadonlyMap<Address, Contract>,
): Hex => {
  const addresses = [...new Set([...balances.keys(), ...contracts.keys()])].sort();
  const leaves = addresses.map((a) =>
    keccak(
      encode([a, balances.get(a) ?? 0n, contracts.get(a)?.digest() ?? new Uint8Array()]),
    ),
  );
  return toHex(merkle(leaves));
};
