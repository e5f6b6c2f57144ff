import SQLite from "better-sqlite3";
import * as k from "kysely";

import { directives, many, one } from "./directives.ts";
import { createHydrator } from "./hydrator.ts";
import { type ResolveContext } from "./registry.ts";
import { seed, type SeedDB } from "./seed.ts";

const sqlite = new SQLite(":memory:");
seed(sqlite);

const db = new k.Kysely<SeedDB>({
	dialect: new k.SqliteDialect({ database: sqlite }),
});

class Author {
	constructor(
		readonly id: number,
		readonly username: string,
	) {}
}

class Reply {
	constructor(
		readonly id: number,
		readonly content: string,
	) {}
}

class Article {
	static hydrate = directives<Article>({
		// Finder: the value of `authorId` is passed to the resolver for Author.
		author: one("authorId", Author),
		// Method: `loadReplies` is called with the article itself.
		replies: many("loadReplies"),
	});

	author: Author | null = null;
	replies: Reply[] = [];

	constructor(
		readonly id: number,
		readonly authorId: number,
	) {}

	async loadReplies(_article: unknown, { signal }: ResolveContext): Promise<Reply[]> {
		signal?.throwIfAborted();
		console.log("calling loadReplies");
		const rows = await db
			.selectFrom("comments")
			.select(["id", "content"])
			.where("post_id", "=", this.id)
			.execute();
		return rows.map((row) => new Reply(row.id, row.content));
	}
}

const hydrator = createHydrator({ concurrencyLimit: 2 }).register(Author, async (id) => {
	console.log("finding author", id);
	if (typeof id !== "number") {
		return null;
	}
	const row = await db
		.selectFrom("users")
		.select(["id", "username"])
		.where("id", "=", id)
		.executeTakeFirst();
	return row ? new Author(row.id, row.username) : null;
});

const article = await hydrator.print().hydrate(new Article(1, 1));

console.log("article:", article);
console.log("article.author:", article.author);
console.log("article.replies:", article.replies);

await db.destroy();
