import { type TypeKey, type TypeRef } from "./directives.ts";
import { InvalidTypeKeyError } from "./helpers/errors.ts";
import { kindOf } from "./helpers/utils.ts";

/**
 * Passed to every resolver and method call.
 */
export interface ResolveContext {
	/**
	 * The signal given to `hydrate()`, if any.  Resolvers are responsible for
	 * honoring it; the hydrator never interrupts a call that has started.
	 */
	readonly signal: AbortSignal | undefined;
	/**
	 * The name of the field being resolved.
	 */
	readonly field: string;
	/**
	 * The record that owns the field.
	 */
	readonly record: object;
}

/**
 * Produces the value of a field from an opaque input: the value of the sibling
 * field named by the directive, or the whole record for methods.  Errors are
 * reported by throwing or rejecting.
 */
export type Resolver<Output = unknown> = (
	input: unknown,
	context: ResolveContext,
) => Output | Promise<Output>;

/**
 * Any value a resolver for `T` may produce, for any field mode.
 */
export type ResolvedValue<T> = T | readonly T[] | null;

/**
 * Returns the key a type is stored under.  Classes and strings are their own
 * keys; any other object is a sample instance, keyed by its constructor.
 */
export function typeKeyOf(type: TypeRef | object): TypeKey {
	if (typeof type === "string" || typeof type === "function") {
		return type;
	}

	const ctor: unknown = Reflect.get(type, "constructor");
	if (typeof ctor !== "function") {
		throw new InvalidTypeKeyError(kindOf(type));
	}
	return ctor;
}

export function describeTypeKey(key: TypeKey): string {
	if (typeof key === "string") {
		return key;
	}
	const name: unknown = Reflect.get(key, "name");
	return typeof name === "string" && name !== "" ? name : "(anonymous)";
}

/**
 * Resolver bindings keyed by the type a field points to or contains.  The last
 * registration for a key wins.
 */
export class Registry {
	readonly #resolvers = new Map<TypeKey, Resolver>();

	get size(): number {
		return this.#resolvers.size;
	}

	set(type: TypeRef | object, resolver: Resolver): void {
		this.#resolvers.set(typeKeyOf(type), resolver);
	}

	get(type: TypeRef | object): Resolver | undefined {
		return this.#resolvers.get(typeKeyOf(type));
	}

	has(type: TypeRef | object): boolean {
		return this.#resolvers.has(typeKeyOf(type));
	}

	delete(type: TypeRef | object): boolean {
		return this.#resolvers.delete(typeKeyOf(type));
	}

	keys(): IterableIterator<TypeKey> {
		return this.#resolvers.keys();
	}
}
