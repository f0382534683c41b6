import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { formatUnits } from "@perch/social-core";
import { READ_SCOPE, requireServiceAuth } from "../auth.js";
import type { SocialState } from "../state.js";

const identitySchema = z.string().min(3).max(256);

export const registerRewardRoutes = (app: FastifyInstance, state: SocialState) => {
  const { engine, ledger } = state;

  app.get("/v1/rewards/balance/:identity", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: [READ_SCOPE] });
    if (reply.sent) return;
    const params = z.object({ identity: identitySchema }).parse(request.params);
    const units = ledger.balanceOf(params.identity);
    return reply.send({
      identity: params.identity,
      decimals: ledger.decimals,
      units: units.toString(),
      balance: formatUnits(units, ledger.decimals)
    });
  });

  app.get("/v1/rewards/config", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: [READ_SCOPE] });
    if (reply.sent) return;
    return reply.send({
      decimals: ledger.decimals,
      likeRewardUnits: engine.likeReward.toString(),
      likeReward: formatUnits(engine.likeReward, ledger.decimals),
      totalSupplyUnits: ledger.totalSupply().toString()
    });
  });
};
