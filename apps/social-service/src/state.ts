import { InMemoryTokenLedger, SocialEngine, toBaseUnits } from "@perch/social-core";
import { config } from "./config.js";
import { log } from "./log.js";
import { metrics } from "./metrics.js";

export type SocialState = {
  engine: SocialEngine;
  ledger: InMemoryTokenLedger;
};

export const createSocialState = (): SocialState => {
  const ledger = new InMemoryTokenLedger({ decimals: config.REWARD_TOKEN_DECIMALS });
  const engine = new SocialEngine({
    rewardSink: ledger,
    likeReward: toBaseUnits(BigInt(config.LIKE_REWARD_TOKENS), config.REWARD_TOKEN_DECIMALS),
    logger: log
  });
  engine.onEvent((entry) => {
    metrics.incCounter("social_events_total", { type: entry.event.type });
    if (entry.event.type === "reaction.added" && entry.event.liked) {
      metrics.incCounter("social_reward_credits_total");
    }
    log.info("social.event", { sequence: entry.sequence, type: entry.event.type });
  });
  return { engine, ledger };
};
