export { SocialEngine } from "./engine.js";
export type { SocialEngineOptions } from "./engine.js";
export { SocialError, isSocialError } from "./errors.js";
export type { SocialErrorKind } from "./errors.js";
export { canView } from "./visibility.js";
export type { FollowLookup } from "./visibility.js";
export {
  DEFAULT_TOKEN_DECIMALS,
  LIKE_REWARD_TOKENS,
  formatUnits,
  toBaseUnits
} from "./rewards.js";
export type { RewardSink } from "./rewards.js";
export { InMemoryTokenLedger } from "./tokenLedger.js";
export type { ReactionOutcome } from "./reactionLedger.js";
export type { EventListener } from "./eventJournal.js";
export type {
  Clock,
  Comment,
  EngineLogger,
  Identity,
  JournalEntry,
  PostSnapshot,
  Profile,
  ProfileView,
  SocialEvent,
  SocialEventType
} from "./types.js";
