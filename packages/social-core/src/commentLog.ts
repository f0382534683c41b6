import { SocialError } from "./errors.js";
import type { ContentStore } from "./contentStore.js";
import type { Comment, Identity } from "./types.js";

export class CommentLog {
  private readonly store: Pick<ContentStore, "require" | "isVisibleTo">;

  constructor(store: Pick<ContentStore, "require" | "isVisibleTo">) {
    this.store = store;
  }

  append(commenter: Identity, postId: number, content: string, createdAt: string): Comment {
    const post = this.store.require(postId);
    if (!this.store.isVisibleTo(post, commenter)) {
      throw new SocialError("CommentForbidden");
    }
    const comment: Comment = {
      index: post.comments.length,
      commenter,
      content,
      createdAt
    };
    post.comments.push(comment);
    return comment;
  }

  list(viewer: Identity, postId: number): Comment[] {
    const post = this.store.require(postId);
    if (!this.store.isVisibleTo(post, viewer)) {
      throw new SocialError("PrivateAccessDenied");
    }
    return post.comments.map((comment) => ({ ...comment }));
  }
}
