import { Project } from "ts-morph";
import { describe, expect, test } from "vitest";
import {
	type TypeDescriptor,
	UNSET,
	UnsupportedObjectError,
	describeTypeNode,
	enumOf,
	flattenUnion,
	generic,
	getChoices,
	getEnumChoices,
	getLiteralChoices,
	isDirectLiteral,
	isIterableType,
	isMappingType,
	isOrContainsLiteral,
	isUnion,
	literalContains,
	literalOf,
	plain,
	renderName,
	simplifiedName,
	simplify,
	typeArgs,
	typeOfValue,
	typeOrigin,
	typeToData,
	unionOf,
} from "../lib/index.ts";

function typeOf(source: string, alias = "T"): TypeDescriptor {
	const project = new Project({ useInMemoryFileSystem: true });
	const file = project.createSourceFile("types.ts", source);
	return describeTypeNode(file.getTypeAliasOrThrow(alias).getTypeNode());
}

describe("describeTypeNode", () => {
	test("returns UNSET without an annotation", () => {
		expect(describeTypeNode(undefined)).toBe(UNSET);
	});

	test("flattens nested unions and drops repeated branches", () => {
		const t = typeOf("type T = string | (number | string) | boolean;");
		expect(t).toEqual(unionOf([plain("string"), plain("number"), plain("boolean")]));
		expect(renderName(t)).toBe("string | number | boolean");
	});

	test("collapses X | X to X", () => {
		expect(typeOf("type T = string | string;")).toEqual(plain("string"));
	});

	test("merges an all-literal union into one literal", () => {
		const t = typeOf('type T = "a" | "b" | 3;');
		expect(t).toEqual(literalOf(["a", "b", 3]));
		expect(isDirectLiteral(t)).toBe(true);
	});

	test("keeps null next to merged literals", () => {
		const t = typeOf('type T = "a" | "b" | null;');
		expect(t).toEqual(unionOf([literalOf(["a", "b"]), plain("null")]));
		expect(getChoices(t)).toEqual(["a", "b"]);
		expect(isOrContainsLiteral(t)).toBe(true);
		expect(isDirectLiteral(t)).toBe(false);
	});

	test("reads arrays, tuples and generic references", () => {
		expect(typeOf("type T = Array<Map<string, number[]>>;")).toEqual(
			generic("Array", [
				generic("Map", [plain("string"), generic("Array", [plain("number")])]),
			]),
		);
		expect(typeOf("type T = readonly string[];")).toEqual(
			generic("Array", [plain("string")]),
		);
		expect(renderName(typeOf("type T = [name: string, age: number];"))).toBe(
			"[string, number]",
		);
	});

	test("expands non-generic aliases", () => {
		const t = typeOf('type Mode = "on" | "off";\ntype T = Mode | null;');
		expect(t).toEqual(unionOf([literalOf(["on", "off"]), plain("null")]));
		expect(simplifiedName(t)).toBe('("on" | "off")?');
	});

	test("stops at a cyclic alias", () => {
		expect(typeOf("type T = U;\ntype U = T;")).toEqual(plain("U"));
	});

	test("resolves enum references to their member names", () => {
		const t = typeOf("enum Level { Low, High }\ntype T = Level;");
		expect(t).toEqual(enumOf("Level", ["Low", "High"]));
		expect(getEnumChoices(t)).toEqual(["Low", "High"]);
	});

	test("strips namespace qualification when rendering", () => {
		const t = typeOf("namespace ns { export interface Foo { id: string } }\ntype T = ns.Foo;");
		expect(t).toEqual(plain("ns.Foo"));
		expect(renderName(t)).toBe("Foo");
	});
});

describe("unions", () => {
	const nested = unionOf([
		plain("string"),
		{ kind: "union", branches: [plain("number"), plain("string")] },
	]);

	test("flattenUnion is idempotent", () => {
		const once = flattenUnion(nested);
		expect(flattenUnion(unionOf(once))).toEqual(once);
		expect(once).toEqual([plain("string"), plain("number")]);
	});

	test("flattenUnion keeps same-named types from different modules", () => {
		const t = unionOf([plain("a.Foo"), plain("b.Foo"), plain("a.Foo")]);
		expect(flattenUnion(t)).toEqual([plain("a.Foo"), plain("b.Foo")]);
		expect(renderName(t)).toBe("Foo | Foo");
	});

	test("flattenUnion keeps a bigint literal apart from its string form", () => {
		expect(flattenUnion(unionOf([literalOf([1n]), literalOf(["1n"])]))).toHaveLength(2);
	});

	test("flattenUnion wraps a non-union in a list", () => {
		expect(flattenUnion(plain("string"))).toEqual([plain("string")]);
	});

	test("unionOf keeps a single branch wrapped", () => {
		const t = unionOf([plain("string")]);
		expect(isUnion(t)).toBe(true);
		expect(t.branches).toEqual([plain("string")]);
	});

	test("typeOrigin and typeArgs", () => {
		expect(typeOrigin(nested)).toBe("union");
		expect(typeArgs(nested)).toEqual([plain("string"), plain("number")]);
		expect(typeOrigin(generic("Set", [plain("number")]))).toBe("Set");
		expect(typeOrigin(plain("string"))).toBeUndefined();
		expect(typeArgs(plain("string"))).toEqual([]);
	});
});

describe("choices", () => {
	const color = enumOf("Color", ["Red", "Green"]);

	test("collects literal and enum branches without duplicates", () => {
		const t = unionOf([literalOf(["x", "Red"]), color, plain("number")]);
		expect(getChoices(t)).toEqual(["x", "Red", "Green"]);
	});

	test("is empty for a union without literal branches", () => {
		expect(getChoices(unionOf([plain("string"), plain("number")]))).toEqual([]);
	});

	test("is undefined for other types", () => {
		expect(getChoices(plain("string"))).toBeUndefined();
		expect(getChoices(UNSET)).toBeUndefined();
	});

	test("getLiteralChoices reaches the literal branch of a union", () => {
		expect(getLiteralChoices(unionOf([plain("null"), literalOf([1, 2])]))).toEqual([1, 2]);
		expect(() => getLiteralChoices(plain("string"))).toThrow(UnsupportedObjectError);
	});

	test("literalContains needs a direct literal", () => {
		const t = literalOf(["a", "b"]);
		expect(literalContains(t, "a")).toBe(true);
		expect(literalContains(t, "c")).toBe(false);
		expect(() => literalContains(unionOf([t, plain("null")]), "a")).toThrow(
			UnsupportedObjectError,
		);
	});

	test("getEnumChoices rejects non-enums", () => {
		expect(() => getEnumChoices(plain("Color"))).toThrow("'Color' is not an enum");
	});

	test("an empty literal is not a direct literal", () => {
		expect(isDirectLiteral({ kind: "literal", values: [] })).toBe(false);
	});
});

describe("simplify and names", () => {
	test("simplify collapses generics to their origin", () => {
		expect(simplify(generic("Array", [plain("string")]))).toEqual(plain("Array"));
		expect(simplify(unionOf([generic("Set", [plain("number")]), plain("null")]))).toEqual([
			plain("Set"),
			plain("null"),
		]);
		expect(simplify(plain("string"))).toEqual(plain("string"));
	});

	test("renderName", () => {
		expect(renderName(UNSET)).toBe("unset");
		expect(renderName(generic("Map", [plain("string"), plain("number")]))).toBe(
			"Map<string, number>",
		);
		expect(renderName(literalOf(["a", 1, true]))).toBe('"a" | 1 | true');
		expect(renderName(plain("a.b.Widget"))).toBe("Widget");
	});

	test("simplifiedName marks optional types", () => {
		expect(simplifiedName(unionOf([plain("string"), plain("undefined")]))).toBe("string?");
		expect(
			simplifiedName(unionOf([plain("string"), plain("number"), plain("null")])),
		).toBe("(string | number)?");
		expect(simplifiedName(unionOf([plain("string"), plain("number")]))).toBe(
			"string | number",
		);
	});

	test("iterable and mapping origins", () => {
		expect(isIterableType(generic("Array", [plain("string")]))).toBe(true);
		expect(isIterableType(plain("string"))).toBe(true);
		expect(isIterableType(plain("number"))).toBe(false);
		expect(isMappingType(generic("Record", [plain("string"), plain("number")]))).toBe(true);
		expect(isMappingType(generic("Array", [plain("string")]))).toBe(false);
	});
});

describe("typeOfValue", () => {
	test("describes run-time values", () => {
		expect(typeOfValue(undefined)).toBe(UNSET);
		expect(typeOfValue(null)).toEqual(plain("null"));
		expect(typeOfValue("x")).toEqual(plain("string"));
		expect(typeOfValue(4)).toEqual(plain("number"));
		expect(typeOfValue(1n)).toEqual(plain("bigint"));
		expect(typeOfValue([1])).toEqual(plain("Array"));
		expect(typeOfValue({ a: 1 })).toEqual(plain("object"));
		expect(typeOfValue(new Date(0))).toEqual(plain("Date"));
		expect(typeOfValue(() => 1)).toEqual(plain("Function"));
	});

	test("typeToData spells out every kind", () => {
		expect(typeToData(UNSET)).toEqual({ kind: "unset" });
		expect(typeToData(unionOf([literalOf([2n]), plain("null")]))).toEqual({
			kind: "union",
			branches: [
				{ kind: "literal", values: ["2n"] },
				{ kind: "plain", name: "null" },
			],
		});
	});
});
