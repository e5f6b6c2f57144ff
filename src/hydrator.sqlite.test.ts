import assert from "node:assert";
import { describe, test } from "node:test";

import { Comment, Post, Profile, registerBlogFinders, User } from "./__tests__/blog.ts";
import { getDbForTest } from "./__tests__/sqlite.ts";
import { HydrationFailedError, ResolverError } from "./helpers/errors.ts";
import { createHydrator } from "./hydrator.ts";

describe("hydrating records backed by SQLite", () => {
	test("hydrates a post, its author and its comments", async () => {
		const db = getDbForTest();
		const calls = new Map<string, number>();
		const hydrator = registerBlogFinders(createHydrator(), db, calls);

		const post = await hydrator.hydrate(new Post(1, 1, "Post 1"));

		assert.ok(post.author instanceof User);
		assert.strictEqual(post.author.username, "alice");
		assert.ok(post.author.profile instanceof Profile);
		assert.deepStrictEqual(post.author.profile, new Profile(1, "Bio for user 1"));

		assert.strictEqual(post.comments.length, 2);
		assert.ok(post.comments.every((comment) => comment instanceof Comment));
		assert.deepStrictEqual(
			post.comments.map((comment) => [comment.id, comment.content, comment.author?.username]),
			[
				[1, "Comment 1 on post 1", "bob"],
				[2, "Comment 2 on post 1", "carol"],
			],
		);

		// bob's profile has no bio; carol has no profile at all.
		assert.deepStrictEqual(post.comments[0]?.author?.profile, new Profile(2, null));
		assert.strictEqual(post.comments[1]?.author?.profile, null);

		assert.deepStrictEqual(Object.fromEntries(calls), { users: 3, profiles: 3, comments: 1 });

		await db.destroy();
	});

	test("hydrates every post loaded by a query", async () => {
		const db = getDbForTest();
		const hydrator = registerBlogFinders(createHydrator({ concurrencyLimit: 2 }), db);

		const rows = await db.selectFrom("posts").select(["id", "user_id", "title"]).orderBy("id").execute();
		const posts = await Promise.all(
			rows.map((row) => hydrator.hydrate(new Post(row.id, row.user_id, row.title))),
		);

		assert.deepStrictEqual(
			posts.map((post) => [post.title, post.author?.username, post.comments.map((comment) => comment.id)]),
			[
				["Post 1", "alice", [1, 2]],
				["Post 2", "bob", [3]],
				["Post 3", "alice", []],
			],
		);
		assert.strictEqual(posts[1]?.comments[0]?.author?.username, "alice");

		await db.destroy();
	});

	test("leaves a reference unset when nothing is found", async () => {
		const db = getDbForTest();
		const calls = new Map<string, number>();
		const hydrator = registerBlogFinders(createHydrator(), db, calls);

		const post = await hydrator.hydrate(new Post(99, 42, "Orphan"));

		assert.strictEqual(post.author, null);
		assert.deepStrictEqual(post.comments, []);
		assert.deepStrictEqual(Object.fromEntries(calls), { users: 1, comments: 1 });

		await db.destroy();
	});

	test("reports queries that fail", async () => {
		const db = getDbForTest();
		const hydrator = registerBlogFinders(createHydrator(), db);
		await db.destroy();

		const post = new Post(1, 1, "Post 1");
		await assert.rejects(hydrator.hydrate(post), (error) => {
			assert.ok(error instanceof HydrationFailedError);
			assert.strictEqual(error.errors.length, 2);
			assert.ok(error.errors.every((fieldError) => fieldError instanceof ResolverError));
			return true;
		});
		assert.strictEqual(post.author, null);
		assert.deepStrictEqual(post.comments, []);
	});
});
