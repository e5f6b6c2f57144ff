import { type FieldPlan } from "./directives.ts";
import {
	HydrationAbortedError,
	type HydrateError,
	MethodSignatureError,
	MissingSourceFieldError,
	ResolverError,
} from "./helpers/errors.ts";
import { type Gate } from "./helpers/gate.ts";
import { typeNameOf } from "./helpers/utils.ts";
import { type Registry, type ResolveContext } from "./registry.ts";

/**
 * The outcome of resolving one field.  Exactly one is produced per dispatched
 * field.
 */
export type FieldResult =
	| { readonly plan: FieldPlan; readonly ok: true; readonly value: unknown }
	| { readonly plan: FieldPlan; readonly ok: false; readonly error: HydrateError };

export interface DispatchContext {
	readonly registry: Registry;
	readonly gate: Gate;
	readonly signal: AbortSignal | undefined;
}

/**
 * Resolvers and methods receive at most (input, context).
 */
const MAX_RESOLVER_ARITY = 2;

/**
 * Starts resolving one field of `record`.
 *
 * If the record has a method named by the directive, the method is called with
 * the whole record as its input.  Otherwise the directive names a sibling field
 * whose value is passed to the resolver registered for the field's type.
 *
 * Returns `undefined` when the field takes the finder path and no resolver is
 * registered for its type; the field is then left alone.  The returned promise
 * never rejects.
 */
export function dispatchField(
	record: object,
	plan: FieldPlan,
	ctx: DispatchContext,
): Promise<FieldResult> | undefined {
	const context: ResolveContext = { signal: ctx.signal, field: plan.field, record };

	const method: unknown = Reflect.get(record, plan.directive);
	if (typeof method === "function") {
		if (method.length > MAX_RESOLVER_ARITY) {
			return Promise.resolve(
				failure(plan, new MethodSignatureError(typeNameOf(record), plan.directive, method.length)),
			);
		}

		return runTask(plan, ctx, (): unknown => Reflect.apply(method, record, [record, context]));
	}

	const resolver = plan.type === undefined ? undefined : ctx.registry.get(plan.type);
	if (!resolver) {
		return undefined;
	}

	if (!(plan.directive in record)) {
		return Promise.resolve(
			failure(plan, new MissingSourceFieldError(typeNameOf(record), plan.field, plan.directive)),
		);
	}

	const input: unknown = Reflect.get(record, plan.directive);
	return runTask(plan, ctx, () => resolver(input, context));
}

/**
 * Runs a resolver call while holding a Gate slot.  An abort observed before the
 * slot is granted means the call never happens.
 */
async function runTask(
	plan: FieldPlan,
	ctx: DispatchContext,
	call: () => unknown,
): Promise<FieldResult> {
	let started = false;

	try {
		const value = await ctx.gate.run(() => {
			started = true;
			return call();
		}, ctx.signal);

		return { plan, ok: true, value };
	} catch (error) {
		if (!started && error instanceof HydrationAbortedError) {
			return failure(plan, error);
		}
		return failure(plan, new ResolverError(plan.field, error));
	}
}

function failure(plan: FieldPlan, error: HydrateError): FieldResult {
	return { plan, ok: false, error };
}
