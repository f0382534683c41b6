import { test } from "node:test";
import assert from "node:assert/strict";
import { canView } from "./visibility.js";

const graph = {
  isFollowing: (target: string, follower: string) => target === "author" && follower === "fan"
};

test("public posts are visible to everyone", () => {
  assert.equal(canView({ author: "author", isPrivate: false }, "stranger", graph), true);
});

test("private posts are visible to the author and followers of the author", () => {
  const post = { author: "author", isPrivate: true };
  assert.equal(canView(post, "author", graph), true);
  assert.equal(canView(post, "fan", graph), true);
  assert.equal(canView(post, "stranger", graph), false);
});
