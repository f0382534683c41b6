export type Identity = string;

export type Profile = {
  identity: Identity;
  username: string;
  bio: string;
  createdAt: string;
};

export type ProfileView = Profile & {
  followerCount: number;
};

export type Comment = {
  index: number;
  commenter: Identity;
  content: string;
  createdAt: string;
};

export type PostSnapshot = {
  id: number;
  author: Identity;
  content: string;
  isPrivate: boolean;
  createdAt: string;
  likes: number;
  dislikes: number;
  commentCount: number;
};

export type SocialEvent =
  | { type: "profile.created"; identity: Identity; username: string; bio: string }
  | { type: "post.created"; id: number; author: Identity; content: string; isPrivate: boolean }
  | { type: "comment.added"; postId: number; commenter: Identity; content: string }
  | { type: "reaction.added"; postId: number; reactor: Identity; liked: boolean }
  | { type: "follow.created"; follower: Identity; target: Identity }
  | { type: "follow.removed"; follower: Identity; target: Identity };

export type SocialEventType = SocialEvent["type"];

export type JournalEntry = {
  sequence: number;
  emittedAt: string;
  event: SocialEvent;
};

export type EngineLogger = {
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export type Clock = () => Date;
