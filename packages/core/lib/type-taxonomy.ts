import { UnsupportedObjectError } from "./errors.ts";
import {
	type EnumType,
	type GenericType,
	type LiteralType,
	type LiteralValue,
	type TypeDescriptor,
	type UnionType,
	plain,
} from "./type-descriptor.ts";

const ITERABLE_ORIGINS = new Set([
	"Array",
	"ReadonlyArray",
	"tuple",
	"Set",
	"ReadonlySet",
	"WeakSet",
	"Map",
	"ReadonlyMap",
	"WeakMap",
	"Record",
	"Iterable",
	"IterableIterator",
	"AsyncIterable",
	"AsyncIterableIterator",
	"Generator",
	"AsyncGenerator",
	"ArrayLike",
	"string",
]);

const MAPPING_ORIGINS = new Set([
	"Map",
	"ReadonlyMap",
	"WeakMap",
	"Record",
	"object",
]);

export function isUnion(t: TypeDescriptor): t is UnionType {
	return t.kind === "union";
}

/**
 * Expand nested union branches into one list.
 * Order follows first appearance; duplicates (equal descriptors) are dropped.
 * A non-union yields a single-element list.
 */
export function flattenUnion(t: TypeDescriptor): TypeDescriptor[] {
	if (!isUnion(t)) return [t];

	const seen = new Set<string>();
	const flattened: TypeDescriptor[] = [];
	for (const branch of t.branches) {
		for (const leaf of flattenUnion(branch)) {
			const key = descriptorKey(leaf);
			if (seen.has(key)) continue;
			seen.add(key);
			flattened.push(leaf);
		}
	}
	return flattened;
}

// bigint literals get their own shape so `1n` and "1n" stay apart
function descriptorKey(t: TypeDescriptor): string {
	return JSON.stringify(t, (_key: string, value: unknown) =>
		typeof value === "bigint" ? { bigint: value.toString() } : value,
	);
}

/**
 * Build a union from branches, flattening nested unions.
 * A single remaining branch is still wrapped: collapsing `X | X` to `X` is done
 * by the annotation reader before it gets here.
 */
export function unionOf(branches: readonly TypeDescriptor[]): UnionType {
	return {
		kind: "union",
		branches: flattenUnion({ kind: "union", branches }),
	};
}

export function isGenericContainer(t: TypeDescriptor): t is GenericType {
	return t.kind === "generic";
}

export function typeOrigin(t: TypeDescriptor): string | undefined {
	switch (t.kind) {
		case "generic":
			return t.origin;
		case "union":
			return "union";
		case "literal":
			return "literal";
		default:
			return undefined;
	}
}

export function typeArgs(t: TypeDescriptor): readonly TypeDescriptor[] {
	switch (t.kind) {
		case "generic":
			return t.args;
		case "union":
			return t.branches;
		default:
			return [];
	}
}

export function isDirectLiteral(t: TypeDescriptor): t is LiteralType {
	return t.kind === "literal" && t.values.length > 0;
}

export function isOrContainsLiteral(t: TypeDescriptor): boolean {
	if (isDirectLiteral(t)) return true;
	return isUnion(t) && t.branches.some(isOrContainsLiteral);
}

export function isEnum(t: TypeDescriptor): t is EnumType {
	return t.kind === "enum";
}

export function getEnumChoices(t: TypeDescriptor): readonly string[] {
	if (!isEnum(t)) {
		throw new UnsupportedObjectError(`'${renderName(t)}' is not an enum`);
	}
	return t.choices;
}

/**
 * Values of a literal type, or of the first literal branch of a union.
 */
export function getLiteralChoices(t: TypeDescriptor): readonly LiteralValue[] {
	if (isDirectLiteral(t)) return t.values;
	if (isUnion(t)) {
		const branch = t.branches.find(isDirectLiteral);
		if (branch) return branch.values;
	}
	throw new UnsupportedObjectError(`'${renderName(t)}' is not a literal`);
}

export function literalContains(t: TypeDescriptor, value: unknown): boolean {
	if (!isDirectLiteral(t)) {
		throw new UnsupportedObjectError(`'${renderName(t)}' is not a literal`);
	}
	return t.values.some((v) => v === value);
}

/**
 * The fixed set of values a type is restricted to.
 *
 * - literal: its values
 * - enum: its member names
 * - union: choices of every literal or enum branch, first-seen order, no duplicates
 * - anything else: `undefined`
 */
export function getChoices(
	t: TypeDescriptor,
): readonly LiteralValue[] | undefined {
	if (isDirectLiteral(t)) return t.values;
	if (isEnum(t)) return t.choices;
	if (!isUnion(t)) return undefined;

	const choices: LiteralValue[] = [];
	for (const branch of t.branches) {
		const branchChoices: readonly LiteralValue[] = isDirectLiteral(branch)
			? branch.values
			: isEnum(branch)
				? branch.choices
				: [];
		for (const choice of branchChoices) {
			if (!choices.includes(choice)) choices.push(choice);
		}
	}
	return choices;
}

/**
 * Collapse a parametrised type to its bare origin (`Array<string>` → `Array`).
 * A union becomes the list of its simplified branches.
 */
export function simplify(t: TypeDescriptor): TypeDescriptor | TypeDescriptor[] {
	if (isUnion(t)) {
		return t.branches.map((branch) =>
			isGenericContainer(branch) ? plain(branch.origin) : branch,
		);
	}
	if (isGenericContainer(t)) return plain(t.origin);
	return t;
}

function stripQualifier(name: string): string {
	// Only dotted identifier paths are qualified names; leave other text alone
	if (!/^[\w$]+(\.[\w$]+)+$/.test(name)) return name;
	return name.slice(name.lastIndexOf(".") + 1);
}

function renderLiteral(value: LiteralValue): string {
	if (typeof value === "string") return JSON.stringify(value);
	if (typeof value === "bigint") return `${value}n`;
	return String(value);
}

export function renderName(t: TypeDescriptor): string {
	switch (t.kind) {
		case "unset":
			return t.toString();
		case "plain":
			return stripQualifier(t.name);
		case "union":
			return t.branches.map(renderName).join(" | ");
		case "generic":
			if (t.origin === "tuple") {
				return `[${t.args.map(renderName).join(", ")}]`;
			}
			if (t.args.length === 0) return stripQualifier(t.origin);
			return `${stripQualifier(t.origin)}<${t.args.map(renderName).join(", ")}>`;
		case "literal":
			return t.values.map(renderLiteral).join(" | ");
		case "enum":
			return stripQualifier(t.name);
	}
}

/**
 * Like {@link renderName}, but an optional type (`X | null` or `X | undefined`)
 * renders as `X?`.
 */
export function simplifiedName(t: TypeDescriptor): string {
	if (!isUnion(t)) return renderName(t);

	const rest = t.branches.filter(
		(b) => !(b.kind === "plain" && (b.name === "null" || b.name === "undefined")),
	);
	if (rest.length === t.branches.length || rest.length === 0) {
		return renderName(t);
	}
	const inner = rest.map(renderName).join(" | ");
	return inner.includes(" | ") ? `(${inner})?` : `${inner}?`;
}

export function isIterableType(t: TypeDescriptor): boolean {
	const origin =
		t.kind === "generic" ? t.origin : t.kind === "plain" ? t.name : undefined;
	return origin !== undefined && ITERABLE_ORIGINS.has(stripQualifier(origin));
}

export function isMappingType(t: TypeDescriptor): boolean {
	const origin =
		t.kind === "generic" ? t.origin : t.kind === "plain" ? t.name : undefined;
	return origin !== undefined && MAPPING_ORIGINS.has(stripQualifier(origin));
}
