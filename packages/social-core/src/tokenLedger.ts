import { DEFAULT_TOKEN_DECIMALS, type RewardSink } from "./rewards.js";
import type { Identity } from "./types.js";

export class InMemoryTokenLedger implements RewardSink {
  readonly decimals: number;
  private readonly balances = new Map<Identity, bigint>();
  private supply = 0n;

  constructor(options: { decimals?: number } = {}) {
    this.decimals = options.decimals ?? DEFAULT_TOKEN_DECIMALS;
  }

  credit(recipient: Identity, amount: bigint) {
    if (amount <= 0n) {
      throw new Error("invalid_amount");
    }
    this.balances.set(recipient, this.balanceOf(recipient) + amount);
    this.supply += amount;
  }

  balanceOf(identity: Identity) {
    return this.balances.get(identity) ?? 0n;
  }

  totalSupply() {
    return this.supply;
  }
}
