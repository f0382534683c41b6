import type { FastifyInstance } from "fastify";
import { metrics } from "../metrics.js";
import type { SocialState } from "../state.js";

export const registerHealthRoutes = (app: FastifyInstance, state: SocialState) => {
  app.get("/healthz", async () => ({ ok: true }));
  app.get("/metrics", async (_request, reply) => {
    metrics.setGauge("social_operation_queue_depth", {}, state.engine.pendingOperations);
    reply.header("content-type", "text/plain; version=0.0.4");
    return reply.send(metrics.render());
  });
};
