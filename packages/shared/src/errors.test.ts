import { test } from "node:test";
import assert from "node:assert/strict";
import { makeErrorResponse } from "./errors.js";

test("debug details are only attached in dev mode", () => {
  const debug = { cause: "ledger_offline" };
  assert.deepEqual(
    makeErrorResponse("reward_unavailable", "Reward ledger unavailable", { debug }),
    { error: "reward_unavailable", message: "Reward ledger unavailable" }
  );
  assert.deepEqual(
    makeErrorResponse("reward_unavailable", "Reward ledger unavailable", { debug, devMode: true }),
    { error: "reward_unavailable", message: "Reward ledger unavailable", debug }
  );
});

test("details are kept when present", () => {
  assert.deepEqual(makeErrorResponse("invalid_request", "Invalid body", { details: "content" }), {
    error: "invalid_request",
    message: "Invalid body",
    details: "content"
  });
});
