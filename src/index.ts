export {
	type AbstractClass,
	type DirectiveName,
	type Directives,
	directives,
	type FieldDirective,
	type FieldMode,
	many,
	type ModeOf,
	one,
	SKIP_DIRECTIVE,
	tuple,
	type TypeKey,
	type TypeRef,
} from "./directives.ts";
export {
	AnonymousFieldError,
	FrozenRecordError,
	HydrateError,
	HydrationAbortedError,
	HydrationFailedError,
	InvalidDirectiveError,
	InvalidOptionError,
	InvalidRecordError,
	InvalidTypeKeyError,
	KindMismatchError,
	MethodSignatureError,
	MissingSourceFieldError,
	NestedHydrationError,
	PrivateFieldError,
	ResolverError,
	UnsupportedFieldKindError,
} from "./helpers/errors.ts";
export {
	createHydrator,
	DEFAULT_ANNOTATION_KEYWORD,
	DEFAULT_CONCURRENCY_LIMIT,
	type HydrateOptions,
	type Hydrator,
	type HydratorOptions,
} from "./hydrator.ts";
export { type ResolveContext, type ResolvedValue, type Resolver } from "./registry.ts";
