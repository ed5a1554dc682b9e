import { UnsupportedObjectError } from "./errors.ts";
import { Signature, type SignatureParts } from "./signature.ts";

export type AnyFunction = (...args: never[]) => unknown;

/**
 * Whether a run-time function is a `class` (as opposed to a plain function).
 */
export function isClassValue(value: unknown): boolean {
	return (
		typeof value === "function" &&
		Function.prototype.toString.call(value).startsWith("class")
	);
}

export function isThenable(value: unknown): value is PromiseLike<unknown> {
	return (
		value !== null &&
		(typeof value === "object" || typeof value === "function") &&
		typeof Reflect.get(value, "then") === "function"
	);
}

/**
 * A standalone function: its signature plus, optionally, the function value it
 * was read from so it can be called.
 */
export class FunctionMetadata extends Signature {
	readonly func: AnyFunction | undefined;

	constructor(parts: SignatureParts, func?: AnyFunction) {
		super(parts);
		this.func = func;
	}

	get isBound(): boolean {
		return this.func !== undefined;
	}

	call(...args: unknown[]): unknown {
		if (!this.func) {
			throw new UnsupportedObjectError(
				`Function ${this.name} has no run-time value to call`,
			);
		}
		return Reflect.apply(this.func, undefined, args);
	}

	/** Like {@link call}, awaiting the result only when it is thenable */
	async callAsync(...args: unknown[]): Promise<unknown> {
		const result = this.call(...args);
		return isThenable(result) ? await result : result;
	}

	callWithArgs(values: Readonly<Record<string, unknown>>): unknown {
		return this.call(...this.toCallArguments(values));
	}
}
