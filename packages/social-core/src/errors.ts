export type SocialErrorKind =
  | "AlreadyExists"
  | "InvalidUsername"
  | "ProfileRequired"
  | "NotFound"
  | "PrivateAccessDenied"
  | "CommentForbidden"
  | "AlreadyReacted"
  | "SelfFollow"
  | "AlreadyFollowing"
  | "NotFollowing"
  | "RewardFailed";

const MESSAGES: Record<SocialErrorKind, string> = {
  AlreadyExists: "profile_already_exists",
  InvalidUsername: "username_required",
  ProfileRequired: "profile_required",
  NotFound: "post_not_found",
  PrivateAccessDenied: "private_access_denied",
  CommentForbidden: "comment_forbidden",
  AlreadyReacted: "already_reacted",
  SelfFollow: "self_follow",
  AlreadyFollowing: "already_following",
  NotFollowing: "not_following",
  RewardFailed: "reward_credit_failed"
};

export class SocialError extends Error {
  readonly kind: SocialErrorKind;

  constructor(kind: SocialErrorKind, options?: { cause?: unknown }) {
    super(MESSAGES[kind], options);
    this.name = "SocialError";
    this.kind = kind;
  }
}

export const isSocialError = (value: unknown): value is SocialError =>
  value instanceof SocialError;
