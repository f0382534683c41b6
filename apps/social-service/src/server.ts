import fastify from "fastify";
import rateLimit from "@fastify/rate-limit";
import { randomUUID } from "node:crypto";
import { ZodError } from "zod";
import { makeErrorResponse } from "@perch/shared";
import { isSocialError } from "@perch/social-core";
import { config } from "./config.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";
import { SOCIAL_ERROR_HTTP } from "./httpErrors.js";
import { createSocialState, type SocialState } from "./state.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerSocialRoutes } from "./routes/social.js";
import { registerRewardRoutes } from "./routes/rewards.js";

// Fastify and its plugins attach an HTTP status to the errors they raise.
const readStatusCode = (error: unknown) =>
  typeof error === "object" &&
  error !== null &&
  "statusCode" in error &&
  typeof error.statusCode === "number"
    ? error.statusCode
    : undefined;

export const buildServer = (options: { state?: SocialState } = {}) => {
  const state = options.state ?? createSocialState();
  const app = fastify({
    logger: false,
    trustProxy: config.TRUST_PROXY,
    bodyLimit: config.BODY_LIMIT_BYTES,
    requestIdHeader: "x-request-id",
    genReqId: () => randomUUID()
  });

  app.addHook("onRequest", async (request, reply) => {
    reply.header("X-Request-Id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    const route = request.routeOptions.url ?? request.url.split("?")[0];
    metrics.incCounter("requests_total", {
      route,
      method: request.method,
      status: String(reply.statusCode)
    });
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send(
        makeErrorResponse("invalid_request", "Invalid request", {
          details: error.issues.map((issue) => issue.path.join(".") || issue.message).join(","),
          devMode: config.DEV_MODE
        })
      );
    }
    if (isSocialError(error)) {
      const mapped = SOCIAL_ERROR_HTTP[error.kind];
      return reply.code(mapped.status).send(
        makeErrorResponse(mapped.code, mapped.message, {
          devMode: config.DEV_MODE,
          debug: error.cause instanceof Error ? { cause: error.cause.message } : undefined
        })
      );
    }
    const err = error instanceof Error ? error : new Error("unknown_error");
    const statusCode = readStatusCode(error);
    if (statusCode === 429) {
      return reply.code(429).send(makeErrorResponse("rate_limited", "Too many requests"));
    }
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return reply
        .code(statusCode)
        .send(makeErrorResponse("invalid_request", err.message, { devMode: config.DEV_MODE }));
    }
    log.error("request.failed", { requestId: request.id, error: err });
    return reply.code(500).send(
      makeErrorResponse("internal_error", "Internal error", {
        devMode: config.DEV_MODE,
        debug: config.DEV_MODE ? { cause: err.message } : undefined
      })
    );
  });

  app.register(rateLimit, { max: config.RATE_LIMIT_MAX_PER_MINUTE, timeWindow: "1 minute" });

  app.register(async (scoped) => {
    registerHealthRoutes(scoped, state);
    registerSocialRoutes(scoped, state);
    registerRewardRoutes(scoped, state);
  });

  return app;
};
