import { type Kysely } from "kysely";

import { directives, many, one } from "../directives.ts";
import { type Hydrator } from "../hydrator.ts";
import { type SeedDB } from "../seed.ts";

//
// Records backed by the seeded database.  Leaf types come first: a directive
// table refers to the classes it hydrates when the class is defined.
//

export class Profile {
	constructor(
		readonly id: number,
		readonly bio: string | null,
	) {}
}

export class User {
	static hydrate = directives<User>({
		profile: one("id", Profile),
	});

	profile: Profile | null = null;

	constructor(
		readonly id: number,
		readonly username: string,
	) {}
}

export class Comment {
	static hydrate = directives<Comment>({
		author: one("userId", User),
	});

	author: User | null = null;

	constructor(
		readonly id: number,
		readonly userId: number,
		readonly content: string,
	) {}
}

export class Post {
	static hydrate = directives<Post>({
		author: one("userId", User),
		comments: many("id", Comment),
	});

	author: User | null = null;
	comments: Comment[] = [];

	constructor(
		readonly id: number,
		readonly userId: number,
		readonly title: string,
	) {}
}

function toId(input: unknown): number {
	if (typeof input !== "number") {
		throw new TypeError(`Expected a numeric id, got ${typeof input}`);
	}
	return input;
}

/**
 * Registers finders for every blog record type.  `calls` counts the queries
 * made per table.
 */
export function registerBlogFinders(
	hydrator: Hydrator,
	db: Kysely<SeedDB>,
	calls: Map<string, number> = new Map(),
): Hydrator {
	const count = (table: string) => calls.set(table, (calls.get(table) ?? 0) + 1);

	return hydrator
		.register(User, async (id) => {
			count("users");
			const row = await db
				.selectFrom("users")
				.select(["id", "username"])
				.where("id", "=", toId(id))
				.executeTakeFirst();
			return row ? new User(row.id, row.username) : null;
		})
		.register(Profile, async (userId) => {
			count("profiles");
			const row = await db
				.selectFrom("profiles")
				.select(["id", "bio"])
				.where("user_id", "=", toId(userId))
				.executeTakeFirst();
			return row ? new Profile(row.id, row.bio) : null;
		})
		.register(Comment, async (postId) => {
			count("comments");
			const rows = await db
				.selectFrom("comments")
				.select(["id", "user_id", "content"])
				.where("post_id", "=", toId(postId))
				.orderBy("id")
				.execute();
			return rows.map((row) => new Comment(row.id, row.user_id, row.content));
		});
}
