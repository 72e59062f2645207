import { describe, it, expect } from "vitest";
import { Bank } from "../src/contracts/bank";
import { invalid } from "../src/core/errors";
import { contractAddress } from "../src/core/hash";
import {
  alice,
  bob,
  deployer,
  eventsOf,
  expectRejection,
  mkRuntime,
  upper,
} from "./helpers/accounts";

describe("Runtime", () => {
  it("derives contract addresses from deployer and nonce", () => {
    const a = mkRuntime();
    const b = mkRuntime();
    const first = Bank.deploy(a, deployer);
    const second = Bank.deploy(a, deployer);

    expect(first.address).toBe(contractAddress(deployer, 0n));
    expect(second.address).toBe(contractAddress(deployer, 1n));
    expect(first.address).not.toBe(second.address);
    expect(Bank.deploy(b, deployer).address).toBe(first.address);
    expect(first.address).toMatch(/^0x[0-9a-f]{40}$/);
  });

  it("funds externally owned accounts only", () => {
    const rt = mkRuntime();
    const bank = Bank.deploy(rt, deployer);
    rt.fund(alice, 10n);

    expect(rt.balanceOf(alice)).toBe(10n);
    expectRejection(() => rt.fund(bank.address, 10n), "validation", "fund-contract");
    expectRejection(() => rt.fund(alice, 0n), "validation", "amount-not-positive");
  });

  it("keys balances by the lowercase address", () => {
    const rt = mkRuntime();
    const bank = Bank.deploy(rt, upper(deployer));
    rt.fund(upper(alice), 10n);
    rt.send(upper(alice), upper(bob), 4n);

    expect(bank.address).toBe(contractAddress(deployer, 0n));
    expect(rt.balanceOf(alice)).toBe(6n);
    expect(rt.balanceOf(bob)).toBe(4n);
    expect(rt.balanceOf(upper(bob))).toBe(4n);
    expectRejection(() => rt.fund(upper(bank.address), 1n), "validation", "fund-contract");
    expectRejection(() => rt.fund("0x1234", 1n), "validation", "malformed-address");
  });

  it("moves value between accounts", () => {
    const rt = mkRuntime([alice]);
    rt.send(alice, bob, 400n);
    expect(rt.balanceOf(alice)).toBe(600n);
    expect(rt.balanceOf(bob)).toBe(400n);
  });

  it("rejects a send the sender cannot cover", () => {
    const rt = mkRuntime([alice]);
    const root = rt.stateRoot();
    expectRejection(() => rt.send(alice, bob, 1_001n), "insufficiency", "insufficient-funds");
    expect(rt.stateRoot()).toBe(root);
  });

  it("refuses calls into contracts it does not host", () => {
    const rt = mkRuntime();
    const stray = new Bank(rt, "0x00000000000000000000000000000000000000ff", deployer);
    expectRejection(
      () => rt.invoke(alice, stray, () => stray.getPooledBalance()),
      "validation",
      "unknown-contract",
    );
  });

  it("undoes every effect of a failed frame, nested ones included", () => {
    const rt = mkRuntime([alice]);
    const bank = Bank.deploy(rt, deployer);
    rt.send(alice, bank.address, 5n);
    const root = rt.stateRoot();

    expectRejection(
      () =>
        rt.invoke(alice, bank, () => {
          rt.send(alice, bank.address, 7n);
          rt.send(alice, bob, 3n);
          throw invalid("boom");
        }),
      "validation",
      "boom",
    );

    expect(rt.stateRoot()).toBe(root);
    expect(bank.getPooledBalance()).toBe(5n);
    expect(rt.balanceOf(bob)).toBe(0n);
    expect(eventsOf(rt, bank.address)).toHaveLength(1);
  });

  it("reports a failed payout as a transport error", () => {
    const rt = mkRuntime([alice]);
    const err = expectRejection(() => rt.transfer(alice, bob, 5_000n), "transport", "transfer-failed");
    expect(err).toMatchObject({ cause: { kind: "insufficiency", message: "insufficient-funds" } });
  });

  it("changes its root only when state changes", () => {
    const rt = mkRuntime([alice]);
    const bank = Bank.deploy(rt, deployer);
    const before = rt.stateRoot();

    expect(rt.stateRoot()).toBe(before);
    rt.send(alice, bank.address, 1n);
    expect(rt.stateRoot()).not.toBe(before);
  });
});
