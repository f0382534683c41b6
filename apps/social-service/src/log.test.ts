import { test } from "node:test";
import assert from "node:assert/strict";
import { redact } from "./log.js";

test("secrets, bearer headers and JWTs are redacted", () => {
  assert.deepEqual(
    redact({
      authorization: "Bearer abc",
      note: "token eyJhbGciOiJIUzI1NiJ9.eyJzdWIiOiJ4In0.c2ln here",
      header: "Bearer abc",
      amount: 10n,
      error: new Error("ledger_offline")
    }),
    {
      authorization: "[redacted]",
      note: "token [redacted] here",
      header: "Bearer [redacted]",
      amount: "10",
      error: { name: "Error", message: "ledger_offline" }
    }
  );
});
