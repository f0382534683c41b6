import { test } from "node:test";
import assert from "node:assert/strict";
import { parseConfig } from "./config.js";

test("defaults apply when the environment is empty", () => {
  const config = parseConfig({});
  assert.equal(config.PORT, 3005);
  assert.equal(config.SERVICE_BIND_ADDRESS, "0.0.0.0");
  assert.equal(config.REWARD_TOKEN_DECIMALS, 18);
  assert.equal(config.LIKE_REWARD_TOKENS, 10);
  assert.equal(config.ALLOW_INSECURE_DEV_AUTH, false);
  assert.equal(config.SERVICE_JWT_SECRET_SOCIAL, undefined);
});

test("numeric values fall back when unparseable", () => {
  const config = parseConfig({ PORT: "not-a-port", REWARD_TOKEN_DECIMALS: "6" });
  assert.equal(config.PORT, 3005);
  assert.equal(config.REWARD_TOKEN_DECIMALS, 6);
});

test("production binds to loopback and requires a service secret", () => {
  assert.throws(
    () => parseConfig({ NODE_ENV: "production" }),
    /service_jwt_secret_required_in_production/
  );
  assert.throws(
    () =>
      parseConfig({
        NODE_ENV: "production",
        ALLOW_INSECURE_DEV_AUTH: "true",
        SERVICE_JWT_SECRET_SOCIAL: "test-secret-for-social-service-000000"
      }),
    /insecure_dev_auth_not_allowed_in_production/
  );
  const config = parseConfig({
    NODE_ENV: "production",
    SERVICE_JWT_SECRET_SOCIAL: "test-secret-for-social-service-000000"
  });
  assert.equal(config.SERVICE_BIND_ADDRESS, "127.0.0.1");
});

test("short service secrets are rejected", () => {
  assert.throws(() => parseConfig({ SERVICE_JWT_SECRET_SOCIAL: "short" }));
});
