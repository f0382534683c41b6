import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { isSocialError } from "@perch/social-core";
import { config } from "../config.js";
import { metrics, type SocialAction } from "../metrics.js";
import { READ_SCOPE, WRITE_SCOPE, requireServiceAuth } from "../auth.js";
import type { SocialState } from "../state.js";

const identitySchema = z.string().min(3).max(256);

const postIdParamsSchema = z.object({
  postId: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER)
});

const identityParamsSchema = z.object({ identity: identitySchema });

const viewerQuerySchema = z.object({ viewerDid: identitySchema });

const profileSchema = z.object({
  subjectDid: identitySchema,
  username: z.string().min(1).max(config.USERNAME_MAX_LENGTH),
  bio: z.string().max(config.BIO_MAX_LENGTH).default("")
});

const postSchema = z.object({
  subjectDid: identitySchema,
  content: z.string().min(1).max(config.POST_MAX_LENGTH),
  isPrivate: z.boolean().default(false)
});

const commentSchema = z.object({
  subjectDid: identitySchema,
  content: z.string().min(1).max(config.COMMENT_MAX_LENGTH)
});

const reactSchema = z.object({
  subjectDid: identitySchema,
  liked: z.boolean()
});

const followSchema = z.object({
  subjectDid: identitySchema,
  targetDid: identitySchema
});

const followingQuerySchema = z.object({
  target: identitySchema,
  follower: identitySchema
});

const eventsQuerySchema = z.object({
  after: z.coerce.number().int().min(0).default(0)
});

const trackAction = async <T>(action: SocialAction, run: () => Promise<T>) => {
  metrics.incCounter("social_action_attempt_total", { action });
  try {
    const result = await run();
    metrics.incCounter("social_action_completed_total", { action });
    return result;
  } catch (error) {
    if (isSocialError(error)) {
      metrics.incCounter("social_action_denied_total", { action, reason: error.kind });
    }
    throw error;
  }
};

export const registerSocialRoutes = (app: FastifyInstance, state: SocialState) => {
  const { engine } = state;

  app.post("/v1/social/profile/create", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: [WRITE_SCOPE] });
    if (reply.sent) return;
    const body = profileSchema.parse(request.body ?? {});
    const profile = await trackAction("profile_create", () =>
      engine.createProfile(body.subjectDid, body.username, body.bio)
    );
    return reply.code(201).send({ profile });
  });

  app.get("/v1/social/profile/:identity", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: [READ_SCOPE] });
    if (reply.sent) return;
    const params = identityParamsSchema.parse(request.params);
    return reply.send({ profile: await engine.getProfile(params.identity) });
  });

  app.post("/v1/social/post", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: [WRITE_SCOPE] });
    if (reply.sent) return;
    const body = postSchema.parse(request.body ?? {});
    const post = await trackAction("post", () =>
      engine.createPost(body.subjectDid, body.content, body.isPrivate)
    );
    return reply.code(201).send({ post });
  });

  app.get("/v1/social/post/:postId", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: [READ_SCOPE] });
    if (reply.sent) return;
    const params = postIdParamsSchema.parse(request.params);
    const query = viewerQuerySchema.parse(request.query);
    return reply.send({ post: await engine.getPost(query.viewerDid, params.postId) });
  });

  app.post("/v1/social/post/:postId/react", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: [WRITE_SCOPE] });
    if (reply.sent) return;
    const params = postIdParamsSchema.parse(request.params);
    const body = reactSchema.parse(request.body ?? {});
    const outcome = await trackAction("react", () =>
      engine.react(body.subjectDid, params.postId, body.liked)
    );
    return reply.send({
      postId: outcome.postId,
      liked: outcome.liked,
      likes: outcome.likes,
      dislikes: outcome.dislikes,
      rewardedUnits: outcome.rewarded.toString()
    });
  });

  app.post("/v1/social/post/:postId/comment", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: [WRITE_SCOPE] });
    if (reply.sent) return;
    const params = postIdParamsSchema.parse(request.params);
    const body = commentSchema.parse(request.body ?? {});
    const comment = await trackAction("comment", () =>
      engine.addComment(body.subjectDid, params.postId, body.content)
    );
    return reply.code(201).send({ comment });
  });

  app.get("/v1/social/post/:postId/comments", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: [READ_SCOPE] });
    if (reply.sent) return;
    const params = postIdParamsSchema.parse(request.params);
    const query = viewerQuerySchema.parse(request.query);
    return reply.send({ comments: await engine.getComments(query.viewerDid, params.postId) });
  });

  app.post("/v1/social/follow", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: [WRITE_SCOPE] });
    if (reply.sent) return;
    const body = followSchema.parse(request.body ?? {});
    await trackAction("follow", () => engine.follow(body.subjectDid, body.targetDid));
    return reply.send({ following: true });
  });

  app.post("/v1/social/unfollow", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: [WRITE_SCOPE] });
    if (reply.sent) return;
    const body = followSchema.parse(request.body ?? {});
    await trackAction("unfollow", () => engine.unfollow(body.subjectDid, body.targetDid));
    return reply.send({ following: false });
  });

  app.get("/v1/social/followers/:identity", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: [READ_SCOPE] });
    if (reply.sent) return;
    const params = identityParamsSchema.parse(request.params);
    // Order is unspecified; clients must not rely on it.
    return reply.send({ followers: await engine.listFollowers(params.identity) });
  });

  app.get("/v1/social/following", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: [READ_SCOPE] });
    if (reply.sent) return;
    const query = followingQuerySchema.parse(request.query);
    return reply.send({ following: await engine.isFollowing(query.target, query.follower) });
  });

  app.get("/v1/social/events", async (request, reply) => {
    await requireServiceAuth(request, reply, { requiredScopes: [READ_SCOPE] });
    if (reply.sent) return;
    const query = eventsQuerySchema.parse(request.query);
    return reply.send({ events: await engine.listEvents(query.after) });
  });
};
