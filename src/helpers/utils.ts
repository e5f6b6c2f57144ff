import { UnexpectedCaseError } from "./errors.ts";

export function assertNever(arg: never): never {
	throw new UnexpectedCaseError(`Unexpected case: ${JSON.stringify(arg)}`);
}

/**
 * A record is any non-null object that is not an array.
 */
export function isRecord(value: unknown): value is object {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Describes the kind of a value for error messages.
 */
export function kindOf(value: unknown): string {
	if (value === null) {
		return "null";
	}
	if (Array.isArray(value)) {
		return `array(${value.length})`;
	}
	return typeof value;
}

/**
 * The class name of a record, or "Object" for plain objects.
 */
export function typeNameOf(record: object): string {
	const ctor: unknown = Reflect.get(record, "constructor");
	if (typeof ctor === "function" && ctor.name) {
		return ctor.name;
	}
	return "Object";
}

/**
 * Whether `key` can be assigned on `record`.  Walks the prototype chain to find
 * the property's descriptor: a non-writable data property or an accessor
 * without a setter cannot be assigned, and neither can a missing property on a
 * non-extensible record.
 */
export function isWritable(record: object, key: string): boolean {
	let target: object | null = record;
	while (target !== null) {
		const descriptor = Object.getOwnPropertyDescriptor(target, key);
		if (descriptor) {
			if ("value" in descriptor) {
				// An inherited data property is shadowed on assignment, which needs
				// the record itself to be extensible.
				return descriptor.writable === true && (target === record || Object.isExtensible(record));
			}
			return descriptor.set !== undefined;
		}
		target = Object.getPrototypeOf(target);
	}
	return Object.isExtensible(record);
}
