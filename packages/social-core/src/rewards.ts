import type { Identity } from "./types.js";

/** External balance sink credited when a post is liked. Rejecting aborts the reaction. */
export type RewardSink = {
  credit: (recipient: Identity, amount: bigint) => Promise<void> | void;
};

export const DEFAULT_TOKEN_DECIMALS = 18;
export const LIKE_REWARD_TOKENS = 10n;

export const toBaseUnits = (tokens: bigint, decimals: number) => {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new Error("invalid_decimals");
  }
  return tokens * 10n ** BigInt(decimals);
};

export const formatUnits = (units: bigint, decimals: number) => {
  if (decimals === 0) return units.toString();
  const divisor = 10n ** BigInt(decimals);
  const whole = units / divisor;
  const fraction = (units % divisor).toString().padStart(decimals, "0").replace(/0+$/, "");
  return fraction.length > 0 ? `${whole.toString()}.${fraction}` : whole.toString();
};
