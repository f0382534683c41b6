import { test } from "node:test";
import assert from "node:assert/strict";
import { extractBearerToken, signServiceJwt, verifyServiceJwt } from "./serviceAuth.js";

const secret = "test-secret-0123456789abcdef0123456789";
const audience = "perch.service.social";

test("a signed token verifies and exposes its scopes", async () => {
  const token = await signServiceJwt({
    audience,
    secret,
    ttlSeconds: 120,
    scope: ["social:proxy"]
  });
  const { scopes } = await verifyServiceJwt(token, {
    audience,
    secret,
    issuer: "app-gateway",
    subject: "app-gateway",
    requiredScopes: ["social:proxy"]
  });
  assert.deepEqual(scopes, ["social:proxy"]);
});

test("wrong audience or secret is rejected", async () => {
  const token = await signServiceJwt({ audience, secret, ttlSeconds: 120, scope: [] });
  await assert.rejects(verifyServiceJwt(token, { audience: "perch.service.other", secret }));
  await assert.rejects(verifyServiceJwt(token, { audience, secret: `${secret}-other` }));
});

test("a missing scope is reported by name", async () => {
  const token = await signServiceJwt({ audience, secret, ttlSeconds: 120, scope: ["social:read"] });
  await assert.rejects(
    verifyServiceJwt(token, { audience, secret, requiredScopes: ["social:proxy"] }),
    /jwt_missing_required_scope/
  );
});

test("extractBearerToken only accepts the Bearer scheme", () => {
  assert.equal(extractBearerToken("Bearer abc"), "abc");
  assert.equal(extractBearerToken("Basic abc"), null);
  assert.equal(extractBearerToken(undefined), null);
});
