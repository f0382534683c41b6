import { SocialError } from "./errors.js";
import { FollowerSet } from "./followerSet.js";
import type { Identity } from "./types.js";

export class SocialGraph {
  private readonly followersByTarget = new Map<Identity, FollowerSet>();

  isFollowing(target: Identity, follower: Identity) {
    return this.followersByTarget.get(target)?.has(follower) ?? false;
  }

  assertCanFollow(follower: Identity, target: Identity) {
    if (follower === target) {
      throw new SocialError("SelfFollow");
    }
    if (this.isFollowing(target, follower)) {
      throw new SocialError("AlreadyFollowing");
    }
  }

  follow(follower: Identity, target: Identity) {
    this.assertCanFollow(follower, target);
    let followers = this.followersByTarget.get(target);
    if (!followers) {
      followers = new FollowerSet();
      this.followersByTarget.set(target, followers);
    }
    followers.add(follower);
  }

  unfollow(follower: Identity, target: Identity) {
    const followers = this.followersByTarget.get(target);
    if (!followers || !followers.has(follower)) {
      throw new SocialError("NotFollowing");
    }
    followers.remove(follower);
  }

  listFollowers(target: Identity): Identity[] {
    return this.followersByTarget.get(target)?.toArray() ?? [];
  }

  followerCount(target: Identity) {
    return this.followersByTarget.get(target)?.size ?? 0;
  }
}
