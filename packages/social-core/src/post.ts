import type { Comment, Identity, PostSnapshot } from "./types.js";

export type PostRecord = {
  id: number;
  author: Identity;
  content: string;
  isPrivate: boolean;
  createdAt: string;
  likes: number;
  dislikes: number;
  reactedBy: Set<Identity>;
  comments: Comment[];
};

export const toSnapshot = (post: PostRecord): PostSnapshot => ({
  id: post.id,
  author: post.author,
  content: post.content,
  isPrivate: post.isPrivate,
  createdAt: post.createdAt,
  likes: post.likes,
  dislikes: post.dislikes,
  commentCount: post.comments.length
});
