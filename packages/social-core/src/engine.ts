import { CommentLog } from "./commentLog.js";
import { ContentStore } from "./contentStore.js";
import { EventJournal, type EventListener } from "./eventJournal.js";
import { IdentityRegistry } from "./identityRegistry.js";
import { OperationQueue } from "./operationQueue.js";
import { toSnapshot } from "./post.js";
import { ReactionLedger, type ReactionOutcome } from "./reactionLedger.js";
import {
  DEFAULT_TOKEN_DECIMALS,
  LIKE_REWARD_TOKENS,
  toBaseUnits,
  type RewardSink
} from "./rewards.js";
import { SocialGraph } from "./socialGraph.js";
import type {
  Clock,
  Comment,
  EngineLogger,
  Identity,
  JournalEntry,
  PostSnapshot,
  Profile,
  ProfileView
} from "./types.js";

export type SocialEngineOptions = {
  rewardSink: RewardSink;
  /** Base units credited to the author per like. Defaults to 10 tokens at `tokenDecimals`. */
  likeReward?: bigint;
  tokenDecimals?: number;
  clock?: Clock;
  /** Receives listener failures; the host supplies its own logger. */
  logger: EngineLogger;
};

/**
 * Single authoritative store for profiles, the follow graph, posts, reactions and
 * comments. Every public method is queued, validates before it writes, and emits
 * exactly one journal event when a mutation commits.
 */
export class SocialEngine {
  private readonly registry = new IdentityRegistry();
  private readonly graph = new SocialGraph();
  private readonly content: ContentStore;
  private readonly reactions: ReactionLedger;
  private readonly comments: CommentLog;
  private readonly journal: EventJournal;
  private readonly queue = new OperationQueue();
  private readonly clock: Clock;
  private readonly logger: EngineLogger;

  constructor(options: SocialEngineOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger;
    this.content = new ContentStore(this.registry, this.graph);
    this.reactions = new ReactionLedger({
      store: this.content,
      sink: options.rewardSink,
      likeReward:
        options.likeReward ??
        toBaseUnits(LIKE_REWARD_TOKENS, options.tokenDecimals ?? DEFAULT_TOKEN_DECIMALS)
    });
    this.comments = new CommentLog(this.content);
    this.journal = new EventJournal(this.clock, this.logger);
  }

  get likeReward() {
    return this.reactions.rewardPerLike;
  }

  get pendingOperations() {
    return this.queue.depth;
  }

  private now() {
    return this.clock().toISOString();
  }

  createProfile(caller: Identity, username: string, bio: string): Promise<Profile> {
    return this.queue.run(() => {
      const profile = this.registry.create(caller, username, bio, this.now());
      this.journal.append({ type: "profile.created", identity: caller, username, bio });
      return { ...profile };
    });
  }

  getProfile(identity: Identity): Promise<ProfileView | null> {
    return this.queue.run(() => {
      const profile = this.registry.get(identity);
      if (!profile) return null;
      return { ...profile, followerCount: this.graph.followerCount(identity) };
    });
  }

  follow(caller: Identity, target: Identity): Promise<void> {
    return this.queue.run(() => {
      this.graph.follow(caller, target);
      this.journal.append({ type: "follow.created", follower: caller, target });
    });
  }

  unfollow(caller: Identity, target: Identity): Promise<void> {
    return this.queue.run(() => {
      this.graph.unfollow(caller, target);
      this.journal.append({ type: "follow.removed", follower: caller, target });
    });
  }

  isFollowing(target: Identity, follower: Identity): Promise<boolean> {
    return this.queue.run(() => this.graph.isFollowing(target, follower));
  }

  /** Order is unspecified and changes when followers leave. */
  listFollowers(target: Identity): Promise<Identity[]> {
    return this.queue.run(() => this.graph.listFollowers(target));
  }

  createPost(caller: Identity, content: string, isPrivate: boolean): Promise<PostSnapshot> {
    return this.queue.run(() => {
      const post = this.content.create(caller, content, isPrivate, this.now());
      this.journal.append({
        type: "post.created",
        id: post.id,
        author: caller,
        content,
        isPrivate
      });
      return toSnapshot(post);
    });
  }

  getPost(caller: Identity, id: number): Promise<PostSnapshot> {
    return this.queue.run(() => this.content.getPost(caller, id));
  }

  react(caller: Identity, postId: number, liked: boolean): Promise<ReactionOutcome> {
    return this.queue.run(async () => {
      const outcome = await this.reactions.react(caller, postId, liked);
      this.journal.append({ type: "reaction.added", postId, reactor: caller, liked });
      return outcome;
    });
  }

  addComment(caller: Identity, postId: number, content: string): Promise<Comment> {
    return this.queue.run(() => {
      const comment = this.comments.append(caller, postId, content, this.now());
      this.journal.append({ type: "comment.added", postId, commenter: caller, content });
      return { ...comment };
    });
  }

  getComments(caller: Identity, postId: number): Promise<Comment[]> {
    return this.queue.run(() => this.comments.list(caller, postId));
  }

  listEvents(afterSequence = 0): Promise<JournalEntry[]> {
    return this.queue.run(() => this.journal.after(afterSequence));
  }

  onEvent(listener: EventListener) {
    return this.journal.subscribe(listener);
  }
}
