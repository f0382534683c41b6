import { createMetricsRegistry } from "@perch/shared";

export const metrics = createMetricsRegistry({ service: "social-service" });

export const SOCIAL_ACTIONS = [
  "profile_create",
  "post",
  "comment",
  "react",
  "follow",
  "unfollow"
] as const;

export type SocialAction = (typeof SOCIAL_ACTIONS)[number];

for (const action of SOCIAL_ACTIONS) {
  metrics.incCounter("social_action_attempt_total", { action }, 0);
  metrics.incCounter("social_action_completed_total", { action }, 0);
}
metrics.incCounter("social_reward_credits_total", {}, 0);
