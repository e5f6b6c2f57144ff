export class HydrateError extends Error {
	override name = this.constructor.name;
}

/**
 * Error thrown when `hydrate()` receives something that is not a record
 * (a primitive, `null`, or an array).
 */
export class InvalidRecordError extends HydrateError {
	constructor(kind: string) {
		super(`Cannot hydrate a value of kind ${kind}; expected a record`);
	}
}

/**
 * Error thrown when a record with directives is frozen, so none of its fields
 * could ever be written.
 */
export class FrozenRecordError extends HydrateError {
	constructor(typeName: string) {
		super(`Cannot hydrate frozen record ${typeName}`);
	}
}

export class AnonymousFieldError extends HydrateError {
	constructor(field: string) {
		super(`Attempted to hydrate anonymous field ${field}`);
	}
}

/**
 * Error thrown when a directive table entry does not describe a `one`, `many`
 * or `tuple` field.
 */
export class UnsupportedFieldKindError extends HydrateError {
	constructor(field: string, kind: string) {
		super(`Attempted to hydrate ${kind} field ${field}`);
	}
}

/**
 * Error thrown when a directive table entry is malformed.
 */
export class InvalidDirectiveError extends HydrateError {
	constructor(field: string, reason: string) {
		super(`Invalid directive for field ${field}: ${reason}`);
	}
}

/**
 * Error thrown when a resolver is registered for something that has no type
 * identity, such as an object without a constructor.
 */
export class InvalidTypeKeyError extends HydrateError {
	constructor(kind: string) {
		super(`Cannot derive a type key from ${kind}`);
	}
}

export class PrivateFieldError extends HydrateError {
	constructor(typeName: string, field: string) {
		super(`Attempted to hydrate private field ${typeName}.${field}`);
	}
}

/**
 * Error collected when a resolver or method throws or rejects.  The original
 * error is kept as `cause`.
 */
export class ResolverError extends HydrateError {
	readonly field: string;

	constructor(field: string, cause: unknown) {
		super(`Failed to resolve field ${field}: ${describeCause(cause)}`, { cause });
		this.field = field;
	}
}

/**
 * Error collected when a method named by a directive declares more
 * parameters than a resolver is given.
 */
export class MethodSignatureError extends HydrateError {
	constructor(typeName: string, method: string, arity: number) {
		super(`Method ${typeName}.${method} takes ${arity} parameters and cannot be used as a resolver`);
	}
}

export class MissingSourceFieldError extends HydrateError {
	constructor(typeName: string, field: string, source: string) {
		super(`Cannot resolve ${typeName}.${field}: source field ${source} does not exist`);
	}
}

export class KindMismatchError extends HydrateError {
	constructor(typeName: string, field: string, expected: string, actual: string) {
		super(`Attempted to hydrate ${typeName}.${field} (${expected}) with ${actual}`);
	}
}

/**
 * Error collected when hydrating a resolved record, or an element of a
 * resolved array, fails.
 */
export class NestedHydrationError extends HydrateError {
	readonly field: string;
	readonly index: number | undefined;

	constructor(field: string, cause: unknown, index?: number) {
		const at = index === undefined ? field : `${field}[${index}]`;
		super(`Failed to hydrate nested value at ${at}: ${describeCause(cause)}`, { cause });
		this.field = field;
		this.index = index;
	}
}

export class HydrationAbortedError extends HydrateError {
	constructor(cause?: unknown) {
		super("Hydration was aborted", { cause });
	}
}

/**
 * Error thrown when one or more fields of a record failed to hydrate.  Every
 * collected error is kept in `errors`, in the order results were processed.
 */
export class HydrationFailedError extends HydrateError {
	readonly errors: readonly HydrateError[];

	constructor(typeName: string, errors: readonly HydrateError[]) {
		super(
			errors.length === 1
				? `Failed to hydrate ${typeName}: ${errors[0]?.message}`
				: `Failed to hydrate ${typeName}: ${errors.length} fields failed`,
		);
		this.errors = errors;
	}
}

export class InvalidOptionError extends HydrateError {
	constructor(option: string, value: unknown) {
		super(`Invalid value for option ${option}: ${JSON.stringify(value)}`);
	}
}

export class UnexpectedCaseError extends HydrateError {}

function describeCause(cause: unknown): string {
	return cause instanceof Error ? cause.message : String(cause);
}
