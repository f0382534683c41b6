import { SocialError } from "./errors.js";
import type { ContentStore } from "./contentStore.js";
import type { RewardSink } from "./rewards.js";
import type { Identity } from "./types.js";

export type ReactionOutcome = {
  postId: number;
  liked: boolean;
  rewarded: bigint;
  likes: number;
  dislikes: number;
};

export class ReactionLedger {
  private readonly store: Pick<ContentStore, "require">;
  private readonly sink: RewardSink;
  private readonly likeReward: bigint;

  constructor(input: {
    store: Pick<ContentStore, "require">;
    sink: RewardSink;
    likeReward: bigint;
  }) {
    this.store = input.store;
    this.sink = input.sink;
    this.likeReward = input.likeReward;
  }

  get rewardPerLike() {
    return this.likeReward;
  }

  async react(reactor: Identity, postId: number, liked: boolean): Promise<ReactionOutcome> {
    const post = this.store.require(postId);
    if (post.reactedBy.has(reactor)) {
      throw new SocialError("AlreadyReacted");
    }
    // Nothing is written until the credit settles, so a failed payout leaves the post untouched.
    if (liked) {
      try {
        await this.sink.credit(post.author, this.likeReward);
      } catch (error) {
        throw new SocialError("RewardFailed", { cause: error });
      }
    }
    post.reactedBy.add(reactor);
    if (liked) {
      post.likes += 1;
    } else {
      post.dislikes += 1;
    }
    return {
      postId,
      liked,
      rewarded: liked ? this.likeReward : 0n,
      likes: post.likes,
      dislikes: post.dislikes
    };
  }
}
