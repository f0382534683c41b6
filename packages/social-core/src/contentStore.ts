import { SocialError } from "./errors.js";
import type { IdentityRegistry } from "./identityRegistry.js";
import { toSnapshot, type PostRecord } from "./post.js";
import { canView, type FollowLookup } from "./visibility.js";
import type { Identity, PostSnapshot } from "./types.js";

export class ContentStore {
  private readonly posts = new Map<number, PostRecord>();
  private readonly registry: Pick<IdentityRegistry, "has">;
  private readonly graph: FollowLookup;
  private lastId = 0;

  constructor(registry: Pick<IdentityRegistry, "has">, graph: FollowLookup) {
    this.registry = registry;
    this.graph = graph;
  }

  create(author: Identity, content: string, isPrivate: boolean, createdAt: string) {
    if (!this.registry.has(author)) {
      throw new SocialError("ProfileRequired");
    }
    this.lastId += 1;
    const post: PostRecord = {
      id: this.lastId,
      author,
      content,
      isPrivate,
      createdAt,
      likes: 0,
      dislikes: 0,
      reactedBy: new Set(),
      comments: []
    };
    this.posts.set(post.id, post);
    return post;
  }

  /** Id 0 and unallocated ids are reported as NotFound. */
  require(id: number): PostRecord {
    const post = this.posts.get(id);
    if (!post) {
      throw new SocialError("NotFound");
    }
    return post;
  }

  isVisibleTo(post: PostRecord, viewer: Identity) {
    return canView(post, viewer, this.graph);
  }

  getPost(viewer: Identity, id: number): PostSnapshot {
    const post = this.require(id);
    if (!this.isVisibleTo(post, viewer)) {
      throw new SocialError("PrivateAccessDenied");
    }
    return toSnapshot(post);
  }
}
