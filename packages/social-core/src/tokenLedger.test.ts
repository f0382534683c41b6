import { test } from "node:test";
import assert from "node:assert/strict";
import { InMemoryTokenLedger } from "./tokenLedger.js";
import { formatUnits, toBaseUnits } from "./rewards.js";

test("credit mints into the recipient balance and total supply", () => {
  const ledger = new InMemoryTokenLedger({ decimals: 2 });
  ledger.credit("did:example:alice", 1_000n);
  ledger.credit("did:example:alice", 250n);
  ledger.credit("did:example:bob", 5n);
  assert.equal(ledger.balanceOf("did:example:alice"), 1_250n);
  assert.equal(ledger.balanceOf("did:example:carol"), 0n);
  assert.equal(ledger.totalSupply(), 1_255n);
});

test("credit rejects non-positive amounts", () => {
  const ledger = new InMemoryTokenLedger();
  assert.throws(() => ledger.credit("did:example:alice", 0n), /invalid_amount/);
  assert.equal(ledger.totalSupply(), 0n);
});

test("toBaseUnits scales whole tokens by decimals", () => {
  assert.equal(toBaseUnits(10n, 18), 10_000_000_000_000_000_000n);
  assert.equal(toBaseUnits(10n, 0), 10n);
  assert.throws(() => toBaseUnits(1n, -1), /invalid_decimals/);
});

test("formatUnits renders decimal strings without trailing zeros", () => {
  assert.equal(formatUnits(1_250n, 2), "12.5");
  assert.equal(formatUnits(1_200n, 2), "12");
  assert.equal(formatUnits(5n, 3), "0.005");
  assert.equal(formatUnits(42n, 0), "42");
});
