import { expectTypeOf } from "expect-type";

import { type Directives, directives, many, type ModeOf, one, tuple } from "./directives.ts";
import { createHydrator } from "./hydrator.ts";
import { type ResolveContext } from "./registry.ts";

class User {
	constructor(readonly id: number) {}
}

class Post {
	static hydrate = directives<Post>({
		author: one("authorId", User),
		readers: many("loadReaders"),
		pair: tuple(2, "loadPair"),
		ignored: one("-"),
	});

	author: User | null = null;
	readers: User[] = [];
	pair: [User, User] | null = null;
	ignored: User | null = null;
	authorId = 1;

	loadReaders(): User[] {
		return [];
	}

	loadPair(): [User, User] {
		return [new User(1), new User(2)];
	}
}

//
// Field modes.
//

{
	expectTypeOf<ModeOf<User | null>>().toEqualTypeOf<"one">();
	expectTypeOf<ModeOf<User | undefined>>().toEqualTypeOf<"one">();
	expectTypeOf<ModeOf<User[]>>().toEqualTypeOf<"many">();
	expectTypeOf<ModeOf<readonly User[]>>().toEqualTypeOf<"many">();
	expectTypeOf<ModeOf<[User, User] | null>>().toEqualTypeOf<"tuple">();

	// A single value must be able to start out empty.
	expectTypeOf<ModeOf<User>>().toEqualTypeOf<never>();
	expectTypeOf<ModeOf<number>>().toEqualTypeOf<never>();
}

//
// Directive tables.
//

{
	expectTypeOf(Post.hydrate).toEqualTypeOf<Directives<Post>>();

	directives<Post>({
		// @ts-expect-error - a single-value field cannot be hydrated as an array
		author: many("authorId", User),
	});

	directives<Post>({
		// @ts-expect-error - directives must name a key of the record
		author: one("nonExistent", User),
	});

	directives<Post>({
		// @ts-expect-error - authorId is not nullable
		authorId: one("loadReaders"),
	});
}

//
// Registration.
//

{
	const hydrator = createHydrator();

	hydrator.register(User, (input, context) => {
		expectTypeOf(input).toEqualTypeOf<unknown>();
		expectTypeOf(context).toEqualTypeOf<ResolveContext>();
		return new User(1);
	});
	hydrator.register(User, async () => [new User(1)]);
	hydrator.register(User, () => null);
	hydrator.register(new User(1), () => new User(2));
	hydrator.register("number", () => 1);

	// @ts-expect-error - resolvers for a class must produce instances of it
	hydrator.register(User, () => "user");

	expectTypeOf(hydrator.register("number", () => 1)).toEqualTypeOf(hydrator);
}

//
// Hydration.
//

{
	const hydrator = createHydrator();

	expectTypeOf(hydrator.hydrate(new Post())).resolves.toEqualTypeOf<Post>();
	expectTypeOf(hydrator.hydrate(new Post(), { signal: new AbortController().signal })).resolves.toEqualTypeOf<Post>();
}
