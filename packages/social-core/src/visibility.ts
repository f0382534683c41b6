import type { PostRecord } from "./post.js";
import type { Identity } from "./types.js";

export type FollowLookup = {
  isFollowing: (target: Identity, follower: Identity) => boolean;
};

// Evaluated on every access; follow changes apply to existing posts immediately.
export const canView = (
  post: Pick<PostRecord, "author" | "isPrivate">,
  viewer: Identity,
  graph: FollowLookup
) => !post.isPrivate || viewer === post.author || graph.isFollowing(post.author, viewer);
