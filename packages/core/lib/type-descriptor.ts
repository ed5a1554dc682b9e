/**
 * Closed representation of a type annotation.
 *
 * Every annotation is normalised into one of these variants once, when it is read
 * from source. Everything downstream switches on `kind` and never looks at the
 * syntax again.
 */

/**
 * Sentinel meaning "nothing was declared or supplied".
 * Distinct from `null`, which is a real type and a real default value.
 */
export class Unset {
	static readonly instance = new Unset();

	readonly kind = "unset";

	private constructor() {}

	toString(): string {
		return "unset";
	}

	toJSON(): string {
		return "unset";
	}
}

export const UNSET = Unset.instance;

export function isUnset(value: unknown): value is Unset {
	return value === UNSET;
}

export type LiteralValue = string | number | boolean | bigint;

export type PlainType = {
	readonly kind: "plain";
	readonly name: string;
};

export type UnionType = {
	readonly kind: "union";
	/** Never contains another union */
	readonly branches: readonly TypeDescriptor[];
};

export type GenericType = {
	readonly kind: "generic";
	readonly origin: string;
	readonly args: readonly TypeDescriptor[];
};

export type LiteralType = {
	readonly kind: "literal";
	readonly values: readonly LiteralValue[];
};

export type EnumType = {
	readonly kind: "enum";
	readonly name: string;
	/** Member names in declaration order */
	readonly choices: readonly string[];
};

export type TypeDescriptor =
	| Unset
	| PlainType
	| UnionType
	| GenericType
	| LiteralType
	| EnumType;

export type TypeDescriptorKind = TypeDescriptor["kind"];

export function plain(name: string): PlainType {
	return { kind: "plain", name };
}

export function generic(
	origin: string,
	args: readonly TypeDescriptor[] = [],
): GenericType {
	return { kind: "generic", origin, args };
}

export function literalOf(values: readonly LiteralValue[]): LiteralType {
	return { kind: "literal", values: [...new Set(values)] };
}

export function enumOf(name: string, choices: readonly string[]): EnumType {
	return { kind: "enum", name, choices };
}

/**
 * Descriptor of a run-time value's type, as used for default-value inference.
 * `undefined` is the language's own "no value" marker and yields `UNSET`.
 */
export function typeOfValue(value: unknown): TypeDescriptor {
	if (value === undefined) return UNSET;
	if (value === null) return plain("null");
	if (Array.isArray(value)) return plain("Array");

	switch (typeof value) {
		case "string":
		case "number":
		case "boolean":
		case "bigint":
		case "symbol":
			return plain(typeof value);
		case "function":
			return plain("Function");
		default:
			if (!(value instanceof Object) || value.constructor === Object) {
				return plain("object");
			}
			return plain(value.constructor.name || "object");
	}
}

/** Plain-data projection, with `UNSET` spelled out as its own kind */
export type TypeDescriptorData =
	| { kind: "unset" }
	| { kind: "plain"; name: string }
	| { kind: "union"; branches: TypeDescriptorData[] }
	| { kind: "generic"; origin: string; args: TypeDescriptorData[] }
	| { kind: "literal"; values: (string | number | boolean)[] }
	| { kind: "enum"; name: string; choices: string[] };

export function typeToData(t: TypeDescriptor): TypeDescriptorData {
	switch (t.kind) {
		case "unset":
			return { kind: "unset" };
		case "plain":
			return { kind: "plain", name: t.name };
		case "union":
			return { kind: "union", branches: t.branches.map(typeToData) };
		case "generic":
			return { kind: "generic", origin: t.origin, args: t.args.map(typeToData) };
		case "literal":
			return {
				kind: "literal",
				values: t.values.map((v) => (typeof v === "bigint" ? `${v}n` : v)),
			};
		case "enum":
			return { kind: "enum", name: t.name, choices: [...t.choices] };
	}
}
