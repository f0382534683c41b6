import type { ErrorCode } from "@perch/shared";
import type { SocialErrorKind } from "@perch/social-core";

export const SOCIAL_ERROR_HTTP: Record<
  SocialErrorKind,
  { status: number; code: ErrorCode; message: string }
> = {
  AlreadyExists: { status: 409, code: "conflict", message: "Profile already exists" },
  InvalidUsername: { status: 400, code: "invalid_request", message: "Username is required" },
  ProfileRequired: { status: 403, code: "profile_required", message: "Create a profile first" },
  NotFound: { status: 404, code: "not_found", message: "Post not found" },
  PrivateAccessDenied: { status: 403, code: "forbidden", message: "Post is private" },
  CommentForbidden: { status: 403, code: "forbidden", message: "Cannot comment on this post" },
  AlreadyReacted: { status: 409, code: "conflict", message: "Already reacted to this post" },
  SelfFollow: { status: 400, code: "invalid_request", message: "Cannot follow yourself" },
  AlreadyFollowing: { status: 409, code: "conflict", message: "Already following" },
  NotFollowing: { status: 409, code: "conflict", message: "Not following" },
  RewardFailed: { status: 503, code: "reward_unavailable", message: "Reward ledger unavailable" }
};
