import {
	AnonymousFieldError,
	InvalidDirectiveError,
	PrivateFieldError,
	UnsupportedFieldKindError,
} from "./helpers/errors.ts";
import { assertNever, isRecord, kindOf } from "./helpers/utils.ts";

/**
 * Any class, including abstract ones.
 */
export type AbstractClass<T extends object = object> = abstract new (...args: never[]) => T;

/**
 * Identifies the type a resolver is registered for: a class, or a string key
 * for values that have no class of their own (e.g. `"number"`).
 */
export type TypeRef = string | AbstractClass;

/**
 * The identity a resolver is stored under: a string, or a class compared by
 * reference.
 */
export type TypeKey = string | object;

/**
 * The container kind of a hydrated field.
 *
 * - "one": A single value (usually a nullable reference to a record).
 * - "many": An array of any length.
 * - "tuple": An array of a fixed length.
 */
export type FieldMode = "one" | "many" | "tuple";

/**
 * A directive that tells the hydrator not to touch a field.
 */
export const SKIP_DIRECTIVE = "-";

/**
 * The resolution directive of a single field.
 */
export interface FieldDirective<M extends FieldMode = FieldMode, D extends string = string> {
	/**
	 * The declared container kind of the field.  Resolved values must match it.
	 */
	readonly mode: M;
	/**
	 * The name of a method on the record, or of the sibling field whose value is
	 * passed to the resolver registered for `type`.
	 */
	readonly directive: D;
	/**
	 * The type the field points to or contains.  Needed to look up a resolver;
	 * a directive without a type can only be resolved by a method.
	 */
	readonly type?: TypeRef | undefined;
	/**
	 * The length of a "tuple" field.
	 */
	readonly length?: number | undefined;
}

/**
 * The mode a field of type `V` may be hydrated with, or `never` when the field
 * cannot be hydrated at all.  Single values must be nullable so that they can
 * start out empty.
 */
export type ModeOf<V> =
	NonNullable<V> extends readonly unknown[]
		? number extends NonNullable<V>["length"]
			? "many"
			: "tuple"
		: null extends V
			? "one"
			: undefined extends V
				? "one"
				: never;

/**
 * A directive names either a key of the record or one of the skip values.
 */
export type DirectiveName<T> = (keyof T & string) | "" | typeof SKIP_DIRECTIVE;

/**
 * The directive table of a record type: which fields to hydrate, and how.
 */
export type Directives<T> = {
	readonly [K in keyof T]?: FieldDirective<ModeOf<T[K]>, DirectiveName<T>>;
};

/**
 * Declares the directive table of a record type.  Assign the result to the
 * static property named by the hydrator's `annotationKeyword` (`hydrate` by
 * default):
 *
 * ```ts
 * class Post {
 *   static hydrate = directives<Post>({
 *     author: one("authorId", User),
 *     comments: many("loadComments"),
 *   });
 *
 *   authorId = 0;
 *   author: User | null = null;
 *   comments: Comment[] = [];
 *
 *   loadComments(post: unknown, { signal }: ResolveContext) { ... }
 * }
 * ```
 */
export function directives<T>(table: Directives<T>): Directives<T> {
	return table;
}

/**
 * A single-value field.
 */
export function one<D extends string>(directive: D, type?: TypeRef): FieldDirective<"one", D> {
	return { mode: "one", directive, type };
}

/**
 * An array field of any length.
 */
export function many<D extends string>(directive: D, type?: TypeRef): FieldDirective<"many", D> {
	return { mode: "many", directive, type };
}

/**
 * An array field of exactly `length` elements.
 */
export function tuple<D extends string>(
	length: number,
	directive: D,
	type?: TypeRef,
): FieldDirective<"tuple", D> {
	return { mode: "tuple", directive, type, length };
}

/**
 * A validated directive table entry.
 */
export type FieldPlan = {
	readonly field: string;
	readonly directive: string;
	readonly type: TypeKey | undefined;
} & (
	| { readonly mode: "one" }
	| { readonly mode: "many" }
	| { readonly mode: "tuple"; readonly length: number }
);

export function isSkipDirective(directive: unknown): boolean {
	return directive === "" || directive === SKIP_DIRECTIVE;
}

/**
 * Validates a directive table read from a record's class and returns the fields
 * to dispatch, in table order.
 *
 * Tables are read from an untyped static property, so everything is checked
 * here, and the first structural violation is thrown before any field of the
 * record has been dispatched.
 *
 * @throws {AnonymousFieldError} For a symbol-keyed field.
 * @throws {PrivateFieldError} For a field with an ECMAScript private name.
 * @throws {UnsupportedFieldKindError} For a mode other than one/many/tuple.
 * @throws {InvalidDirectiveError} For an otherwise malformed entry.
 */
export function parseDirectiveTable(table: object, typeName: string): FieldPlan[] {
	const plans: FieldPlan[] = [];

	for (const key of Reflect.ownKeys(table)) {
		const entry: unknown = Reflect.get(table, key);
		if (entry === undefined) {
			continue;
		}
		if (isRecord(entry) && isSkipDirective(Reflect.get(entry, "directive"))) {
			continue;
		}

		if (typeof key === "symbol") {
			throw new AnonymousFieldError(key.toString());
		}
		if (key.startsWith("#")) {
			throw new PrivateFieldError(typeName, key);
		}

		plans.push(parseEntry(key, entry));
	}

	return plans;
}

function parseEntry(field: string, entry: unknown): FieldPlan {
	if (!isRecord(entry)) {
		throw new InvalidDirectiveError(field, `expected an object, got ${kindOf(entry)}`);
	}

	const directive: unknown = Reflect.get(entry, "directive");
	if (typeof directive !== "string") {
		throw new InvalidDirectiveError(field, `directive must be a string, got ${kindOf(directive)}`);
	}

	const rawType: unknown = Reflect.get(entry, "type");
	let type: TypeKey | undefined;
	if (typeof rawType === "string" || typeof rawType === "function") {
		type = rawType;
	} else if (rawType !== undefined) {
		throw new InvalidDirectiveError(field, `type must be a class or a string, got ${kindOf(rawType)}`);
	}

	const mode: unknown = Reflect.get(entry, "mode");
	switch (mode) {
		case "one":
			return { field, directive, type, mode: "one" };
		case "many":
			return { field, directive, type, mode: "many" };
		case "tuple": {
			const length: unknown = Reflect.get(entry, "length");
			if (typeof length !== "number" || !Number.isInteger(length) || length < 1) {
				throw new InvalidDirectiveError(field, `tuple length must be a positive integer`);
			}
			return { field, directive, type, mode: "tuple", length };
		}
		default:
			throw new UnsupportedFieldKindError(field, String(mode));
	}
}

/**
 * Whether a resolved value fits the container kind of a field.  `null` is a
 * valid "one" value (nothing found); `undefined` never is.
 */
export function matchesMode(plan: FieldPlan, value: unknown): boolean {
	switch (plan.mode) {
		case "one":
			return value !== undefined && !Array.isArray(value);
		case "many":
			return Array.isArray(value);
		case "tuple":
			return Array.isArray(value) && value.length === plan.length;
		default:
			return assertNever(plan);
	}
}

export function describeMode(plan: FieldPlan): string {
	return plan.mode === "tuple" ? `tuple(${plan.length})` : plan.mode;
}
