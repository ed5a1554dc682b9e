/**
 * Errors raised while inspecting or invoking declarations.
 * All of them are raised synchronously at the point of failure.
 */

export class InspectError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "InspectError";
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/** A name lookup missed */
export class NotFoundError extends InspectError {
	constructor(
		public readonly key: string,
		scope: string,
	) {
		super(`'${key}' not found in ${scope}`);
		this.name = "NotFoundError";
	}
}

/** A positional lookup missed */
export class IndexOutOfRangeError extends InspectError {
	constructor(
		public readonly index: number,
		public readonly length: number,
	) {
		super(`Index ${index} is out of range (length ${length})`);
		this.name = "IndexOutOfRangeError";
	}
}

/** A selector was neither a name nor an integer index */
export class InvalidKeyTypeError extends InspectError {
	constructor(key: unknown) {
		const description =
			typeof key === "number" ? `non-integer number ${key}` : typeof key;
		super(`Expected a name or an integer index, got ${description}`);
		this.name = "InvalidKeyTypeError";
	}
}

export class AlreadyInitializedError extends InspectError {
	constructor(className: string) {
		super(`Class ${className} is already initialized`);
		this.name = "AlreadyInitializedError";
	}
}

export class NotInitializedError extends InspectError {
	constructor(className: string) {
		super(`Class ${className} is not initialized`);
		this.name = "NotInitializedError";
	}
}

/** The input is neither an inspectable function nor a class, or cannot be used as asked */
export class UnsupportedObjectError extends InspectError {
	constructor(message: string) {
		super(message);
		this.name = "UnsupportedObjectError";
	}
}
