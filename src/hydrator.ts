import {
	type AbstractClass,
	describeMode,
	type FieldPlan,
	matchesMode,
	parseDirectiveTable,
	type TypeRef,
} from "./directives.ts";
import { dispatchField, type FieldResult } from "./dispatch.ts";
import {
	FrozenRecordError,
	HydrationAbortedError,
	HydrationFailedError,
	type HydrateError,
	InvalidOptionError,
	InvalidRecordError,
	KindMismatchError,
	NestedHydrationError,
	PrivateFieldError,
} from "./helpers/errors.ts";
import { Gate } from "./helpers/gate.ts";
import { isRecord, isWritable, kindOf, typeNameOf } from "./helpers/utils.ts";
import {
	describeTypeKey,
	Registry,
	type ResolvedValue,
	type Resolver,
} from "./registry.ts";

/**
 * The default capacity of a hydrator's concurrency gate.
 */
export const DEFAULT_CONCURRENCY_LIMIT = 10;

/**
 * The default name of the static property holding a record type's directives.
 */
export const DEFAULT_ANNOTATION_KEYWORD = "hydrate";

export interface HydratorOptions {
	/**
	 * The maximum number of resolver and method calls in flight at once, across
	 * every nested hydration performed by the hydrator.  Defaults to 10.
	 */
	readonly concurrencyLimit?: number | undefined;
	/**
	 * The static property of a record's class that holds its directive table.
	 * Defaults to "hydrate".
	 */
	readonly annotationKeyword?: string | undefined;
}

export interface HydrateOptions {
	/**
	 * Passed to every resolver and method call.  Fields still waiting for a slot
	 * when it aborts are not resolved.
	 */
	readonly signal?: AbortSignal | undefined;
}

/**
 * Internal configuration for a Hydrator.
 */
interface HydratorProps {
	readonly concurrencyLimit: number;
	readonly annotationKeyword: string;
}

/**
 * What to do with a field once its resolver has settled and any nested
 * hydration has finished.
 */
interface Settlement {
	readonly plan: FieldPlan;
	readonly assign: boolean;
	readonly value: unknown;
	readonly errors: readonly HydrateError[];
}

export type { Hydrator };
/**
 * Populates the fields of records from their directive tables.
 *
 * Each directed field is resolved either by a method on the record or by a
 * resolver registered for the field's type.  Resolved records, and records in
 * resolved arrays, are hydrated in turn before they are attached.
 *
 * A Hydrator is meant to be created once and reused.  All of its hydrations
 * share one {@link Gate}, so `concurrencyLimit` bounds the resolver calls in
 * flight across every nested level.
 */
class Hydrator {
	readonly #props: HydratorProps;
	readonly #registry = new Registry();
	readonly #gate: Gate;
	readonly #plans = new WeakMap<object, readonly FieldPlan[]>();

	constructor(props: HydratorProps) {
		this.#props = props;
		this.#gate = new Gate(props.concurrencyLimit);
	}

	get concurrencyLimit(): number {
		return this.#props.concurrencyLimit;
	}

	get annotationKeyword(): string {
		return this.#props.annotationKeyword;
	}

	//
	// Registry.
	//

	/**
	 * Registers the resolver for fields whose directive names `type`.  Replaces
	 * any resolver registered for the same type.
	 *
	 * @param type - A class, a string key, or a sample instance (keyed by its
	 *   constructor).
	 * @returns This Hydrator, for chaining.
	 */
	register<T extends object>(type: AbstractClass<T>, resolver: Resolver<ResolvedValue<T>>): this;
	register(type: string, resolver: Resolver): this;
	register<T extends object>(sample: T, resolver: Resolver<ResolvedValue<T>>): this;
	register(type: TypeRef | object, resolver: Resolver): this {
		this.#registry.set(type, resolver);
		return this;
	}

	/**
	 * Removes the resolver registered for `type`.
	 *
	 * @returns Whether a resolver was registered.
	 */
	unregister(type: TypeRef | object): boolean {
		return this.#registry.delete(type);
	}

	lookup(type: TypeRef | object): Resolver | undefined {
		return this.#registry.get(type);
	}

	/**
	 * Logs the options and registered types, for debugging.
	 */
	print(): this {
		console.log(this.#props);
		console.log(Array.from(this.#registry.keys(), describeTypeKey));
		return this;
	}

	//
	// Hydration.
	//

	/**
	 * Returns the validated directives of a record, or an empty list when its
	 * class has no directive table.
	 */
	#planFor(record: object): readonly FieldPlan[] {
		const ctor: unknown = Reflect.get(record, "constructor");
		const table: unknown =
			typeof ctor === "function" ? Reflect.get(ctor, this.#props.annotationKeyword) : undefined;
		if (!isRecord(table)) {
			return [];
		}

		let plans = this.#plans.get(table);
		if (!plans) {
			plans = parseDirectiveTable(table, typeNameOf(record));
			this.#plans.set(table, plans);
		}
		return plans;
	}

	/**
	 * Hydrates one record: dispatches every directed field, waits for all of them,
	 * then applies the results.  Throws a structural error before dispatching
	 * anything, or a {@link HydrationFailedError} listing every field error once
	 * all work for the record has finished.
	 */
	async #hydrateRecord(record: object, signal: AbortSignal | undefined): Promise<void> {
		const plans = this.#planFor(record);
		if (plans.length === 0) {
			return;
		}

		const typeName = typeNameOf(record);
		if (Object.isFrozen(record)) {
			throw new FrozenRecordError(typeName);
		}

		const tasks: Promise<FieldResult>[] = [];
		for (const plan of plans) {
			const task = dispatchField(record, plan, { registry: this.#registry, gate: this.#gate, signal });
			if (task) {
				tasks.push(task);
			}
		}

		const results = await Promise.all(tasks);
		const settlements = await Promise.all(
			results.map((result) => this.#settle(record, typeName, result, signal)),
		);

		// Fields are only written here, once everything for the record is done.
		const errors: HydrateError[] = [];
		for (const { plan, assign, value, errors: fieldErrors } of settlements) {
			errors.push(...fieldErrors);
			if (assign && !Reflect.set(record, plan.field, value)) {
				errors.push(new PrivateFieldError(typeName, plan.field));
			}
		}

		if (errors.length > 0) {
			throw new HydrationFailedError(typeName, errors);
		}
	}

	/**
	 * Checks one field result against its field and hydrates what it resolved to.
	 */
	async #settle(
		record: object,
		typeName: string,
		result: FieldResult,
		signal: AbortSignal | undefined,
	): Promise<Settlement> {
		const { plan } = result;

		if (!result.ok) {
			return { plan, assign: false, value: undefined, errors: [result.error] };
		}

		const { value } = result;

		if (!isWritable(record, plan.field)) {
			return {
				plan,
				assign: false,
				value,
				errors: [new PrivateFieldError(typeName, plan.field)],
			};
		}

		if (!matchesMode(plan, value)) {
			return {
				plan,
				assign: false,
				value,
				errors: [new KindMismatchError(typeName, plan.field, describeMode(plan), kindOf(value))],
			};
		}

		if (isRecord(value)) {
			try {
				await this.#hydrateRecord(value, signal);
			} catch (error) {
				return { plan, assign: false, value, errors: [new NestedHydrationError(plan.field, error)] };
			}
		} else if (Array.isArray(value)) {
			// Elements are hydrated concurrently; a failed element does not stop the
			// others, and the array is still attached.
			const elementErrors = await Promise.all(
				value.map((element: unknown, index) => this.#hydrateElement(plan, element, index, signal)),
			);
			return {
				plan,
				assign: true,
				value,
				errors: elementErrors.filter((error): error is NestedHydrationError => error !== undefined),
			};
		}

		return { plan, assign: true, value, errors: [] };
	}

	async #hydrateElement(
		plan: FieldPlan,
		element: unknown,
		index: number,
		signal: AbortSignal | undefined,
	): Promise<NestedHydrationError | undefined> {
		if (!isRecord(element)) {
			return undefined;
		}

		try {
			await this.#hydrateRecord(element, signal);
			return undefined;
		} catch (error) {
			return new NestedHydrationError(plan.field, error, index);
		}
	}

	/**
	 * Hydrates `record` in place and resolves to it.
	 *
	 * Rejects with:
	 * - {@link InvalidRecordError} if `record` is not a record.
	 * - {@link HydrationAbortedError} if `options.signal` is already aborted.
	 * - A structural error ({@link AnonymousFieldError},
	 *   {@link UnsupportedFieldKindError}, {@link PrivateFieldError},
	 *   {@link InvalidDirectiveError}, {@link FrozenRecordError}) if the record's
	 *   directive table cannot be used; no field is resolved in that case.
	 * - {@link HydrationFailedError} if any field failed.  Its `errors` list
	 *   every failure; fields that succeeded are still written.
	 *
	 * @param record - The record to hydrate.
	 * @param options.signal - Passed to every resolver and method call.
	 * @returns A Promise that resolves to the same record
	 */
	async hydrate<T>(record: T, options: HydrateOptions = {}): Promise<T> {
		if (!isRecord(record)) {
			throw new InvalidRecordError(kindOf(record));
		}

		const { signal } = options;
		if (signal?.aborted) {
			throw new HydrationAbortedError(signal.reason);
		}

		await this.#hydrateRecord(record, signal);
		return record;
	}
}

/**
 * Creates a new Hydrator.
 *
 * @param options.concurrencyLimit - The maximum number of resolver calls in
 *   flight at once.  Defaults to 10.
 * @param options.annotationKeyword - The static property holding each record
 *   type's directive table.  Defaults to "hydrate".
 * @throws {InvalidOptionError} If an option is out of range.
 */
export function createHydrator(options: HydratorOptions = {}): Hydrator {
	const concurrencyLimit = options.concurrencyLimit ?? DEFAULT_CONCURRENCY_LIMIT;
	if (!Number.isInteger(concurrencyLimit) || concurrencyLimit < 1) {
		throw new InvalidOptionError("concurrencyLimit", concurrencyLimit);
	}

	const annotationKeyword = options.annotationKeyword ?? DEFAULT_ANNOTATION_KEYWORD;
	if (annotationKeyword === "") {
		throw new InvalidOptionError("annotationKeyword", annotationKeyword);
	}

	return new Hydrator({ concurrencyLimit, annotationKeyword });
}
