import type { FastifyReply, FastifyRequest } from "fastify";
import { extractBearerToken, verifyServiceJwt, makeErrorResponse } from "@perch/shared";
import { config } from "./config.js";
import { log } from "./log.js";

export const WRITE_SCOPE = "social:proxy";
export const READ_SCOPE = "social:read";

/**
 * The gateway authenticates end users and forwards their identity in the request;
 * this service only checks that the request came from the gateway.
 */
export const requireServiceAuth = async (
  request: FastifyRequest,
  reply: FastifyReply,
  options?: { requiredScopes?: string[] }
) => {
  const serviceSecret = config.SERVICE_JWT_SECRET_SOCIAL;
  if (!serviceSecret) {
    if (config.ALLOW_INSECURE_DEV_AUTH) {
      return;
    }
    await reply.code(503).send(
      makeErrorResponse("service_auth_not_configured", "Service authentication is not configured", {
        devMode: config.DEV_MODE
      })
    );
    return;
  }

  const token = extractBearerToken(request.headers.authorization);
  if (!token) {
    await reply.code(401).send(
      makeErrorResponse("invalid_request", "Missing service token", {
        devMode: config.DEV_MODE
      })
    );
    return;
  }

  try {
    await verifyServiceJwt(token, {
      audience: config.SERVICE_JWT_AUDIENCE_SOCIAL,
      secret: serviceSecret,
      issuer: "app-gateway",
      subject: "app-gateway",
      requiredScopes: options?.requiredScopes
    });
  } catch (error) {
    if (error instanceof Error && error.message === "jwt_missing_required_scope") {
      await reply.code(403).send(
        makeErrorResponse("service_auth_scope_missing", "Service token scope missing", {
          devMode: config.DEV_MODE
        })
      );
      return;
    }
    log.warn("service_auth.rejected", { requestId: request.id, error });
    await reply.code(401).send(
      makeErrorResponse("invalid_request", "Invalid service token", {
        devMode: config.DEV_MODE
      })
    );
  }
};
