import { type FunctionDeclaration, Project } from "ts-morph";
import { describe, expect, test } from "vitest";
import {
	IndexOutOfRangeError,
	InvalidKeyTypeError,
	NotFoundError,
	ParameterKind,
	SourceExpression,
	UNSET,
	UnsupportedObjectError,
	enumOf,
	extractSignature,
	plain,
} from "../lib/index.ts";

const source = `
/**
 * Example function.
 *
 * A longer explanation of what it does.
 *
 * @param a The first parameter.
 * @param b The second parameter.
 * @param c The third parameter.
 */
function exampleFunction(a, b = null, c: number = 4) {
	return a;
}

enum Mode { On, Off }

function withExpressions(when = new Date(), mode = Mode.On, label = \`x\${1}\`, list = [1, 2]) {}

function withThis(this: Window, value: string): void {}

/**
 * @param first - Kept.
 * @param first - Ignored.
 * @param second
 * @param second Found later.
 */
function repeated(first: string, second?: string) {}

async function load(
	[x, y]: [number, number],
	{ depth = 2, ...rest }: { depth?: number; [key: string]: unknown } = {},
	...ids: string[]
): Promise<void> {}

function connect(
	{ retries, verbose }: { retries: number; verbose: boolean } = { retries: 3, verbose: true },
) {}

function tail({ flag }: { flag?: boolean }, ...items: number[]) {}

function renamed({ "my-key": value, 2: second }: { "my-key": string; 2: boolean }) {}

function clash(a: string, { a: other }: { a: number }) {}
`;

const project = new Project({ useInMemoryFileSystem: true });
const file = project.createSourceFile("signatures.ts", source);

function fn(name: string): FunctionDeclaration {
	return file.getFunctionOrThrow(name);
}

describe("extractSignature", () => {
	test("reads parameters, defaults and descriptions", () => {
		const sig = extractSignature(fn("exampleFunction"));

		expect(sig.name).toBe("exampleFunction");
		expect(sig.params.map((p) => p.name)).toEqual(["a", "b", "c"]);

		const [a, b, c] = sig.params;
		expect(a.type).toBe(UNSET);
		expect(a.default).toBe(UNSET);
		expect(b.type).toEqual(plain("null"));
		expect(b.default).toBeNull();
		expect(c.type).toEqual(plain("number"));
		expect(c.default).toBe(4);

		expect(a.description).toBe("The first parameter.");
		expect(b.description).toBe("The second parameter.");
		expect(c.description).toBe("The third parameter.");

		expect(sig.description).toBe("Example function.");
		expect(sig.doc.longDescription).toBe("A longer explanation of what it does.");
		expect(sig.hasDocstring).toBe(true);
		expect(sig.returnType).toBe(UNSET);
		expect(sig.render()).toBe("exampleFunction(a, b: null = null, c: number = 4)");
	});

	test("infers types from defaults that are only source text", () => {
		const [when, mode, label, list] = extractSignature(fn("withExpressions")).params;

		expect(when.default).toBeInstanceOf(SourceExpression);
		expect(String(when.default)).toBe("new Date()");
		expect(when.type).toEqual(plain("Date"));
		expect(mode.type).toEqual(enumOf("Mode", ["On", "Off"]));
		expect(label.type).toEqual(plain("string"));
		expect(list.default).toEqual([1, 2]);
		expect(list.type).toEqual(plain("Array"));
	});

	test("skips a this parameter unless asked to keep it", () => {
		expect(extractSignature(fn("withThis")).params.map((p) => p.name)).toEqual(["value"]);

		const kept = extractSignature(fn("withThis"), { skipThis: false });
		expect(kept.params.map((p) => p.name)).toEqual(["this", "value"]);
		expect(kept.params[0].type).toEqual(plain("Window"));
		expect(kept.returnType).toEqual(plain("void"));
	});

	test("the first non-empty description wins", () => {
		const [first, second] = extractSignature(fn("repeated")).params;
		expect(first.description).toBe("Kept.");
		expect(second.description).toBe("Found later.");
		expect(second.hasDefault).toBe(true);
		expect(second.default).toBeUndefined();
	});

	test("ignores doc comments when disabled", () => {
		const sig = extractSignature(fn("exampleFunction"), { includeJSDoc: false });
		expect(sig.docstring).toBeUndefined();
		expect(sig.description).toBe("");
		expect(sig.params[0].description).toBeUndefined();
	});

	test("maps destructured and rest parameters to kinds", () => {
		const sig = extractSignature(fn("load"));

		expect(sig.isAsync).toBe(true);
		expect(sig.render()).toBe(
			"async load([x, y]: [number, number], depth: number = 2, rest, ...ids: Array<string>): Promise<void>",
		);
		expect(sig.params.map((p) => [p.name, p.kind, p.position])).toEqual([
			["[x, y]", ParameterKind.POSITIONAL_ONLY, 0],
			["depth", ParameterKind.KEYWORD_ONLY, 1],
			["rest", ParameterKind.VAR_KEYWORD, 1],
			["ids", ParameterKind.VAR_POSITIONAL, 2],
		]);
	});

	test("quoted and numeric binding keys lose their quotes", () => {
		const sig = extractSignature(fn("renamed"));
		expect(sig.params.map((p) => [p.name, p.kind, p.type])).toEqual([
			["my-key", ParameterKind.KEYWORD_ONLY, plain("string")],
			["2", ParameterKind.KEYWORD_ONLY, plain("boolean")],
		]);
	});

	test("rejects a parameter name bound twice", () => {
		expect(() => extractSignature(fn("clash"))).toThrow(UnsupportedObjectError);
		expect(() => extractSignature(fn("clash"))).toThrow(
			"Parameter 'a' is declared more than once in clash()",
		);
	});
});

describe("Signature", () => {
	const sig = extractSignature(fn("exampleFunction"));

	test("getParam by name and index", () => {
		expect(sig.getParam("b").name).toBe("b");
		expect(sig.getParam(0).name).toBe("a");
		expect(sig.getParam(-1).name).toBe("c");
	});

	test("getParam errors", () => {
		expect(() => sig.getParam("zzz")).toThrow(NotFoundError);
		expect(() => sig.getParam("zzz")).toThrow("'zzz' not found in exampleFunction()");
		expect(() => sig.getParam(3)).toThrow(IndexOutOfRangeError);
		expect(() => sig.getParam(-4)).toThrow(IndexOutOfRangeError);
		expect(() => sig.getParam(1.5)).toThrow(InvalidKeyTypeError);
	});

	test("toCallArguments places values by kind", () => {
		const load = extractSignature(fn("load"));
		expect(
			load.toCallArguments({
				"[x, y]": [1, 2],
				depth: 5,
				rest: { color: "red" },
				ids: ["a", "b"],
			}),
		).toEqual([[1, 2], { depth: 5, color: "red" }, "a", "b"]);
		expect(load.toCallArguments({})).toEqual([undefined]);
	});

	test("toCallArguments keeps the object default of a destructured parameter", () => {
		const connect = extractSignature(fn("connect"));
		expect(connect.params.map((p) => [p.name, p.default])).toEqual([
			["retries", 3],
			["verbose", true],
		]);
		expect(connect.toCallArguments({})).toEqual([]);
		expect(connect.toCallArguments({ verbose: false })).toEqual([
			{ retries: 3, verbose: false },
		]);
	});

	test("toCallArguments starts rest values at their own position", () => {
		const sig = extractSignature(fn("tail"));
		expect(sig.toCallArguments({ items: [1, 2] })).toEqual([undefined, 1, 2]);
		expect(sig.toCallArguments({ flag: true, items: [3] })).toEqual([{ flag: true }, 3]);
	});

	test("toCallArguments leaves gaps for missing positional values", () => {
		expect(sig.toCallArguments({ c: 9 })).toEqual([undefined, undefined, 9]);
	});

	test("toData", () => {
		expect(extractSignature(fn("repeated")).toData()).toEqual({
			name: "repeated",
			parameters: [
				{
					name: "first",
					kind: "POSITIONAL_OR_KEYWORD",
					type: { kind: "plain", name: "string" },
					default: null,
					description: "Kept.",
				},
				{
					name: "second",
					kind: "POSITIONAL_OR_KEYWORD",
					type: { kind: "plain", name: "string" },
					default: "undefined",
					description: "Found later.",
				},
			],
			returnType: { kind: "unset" },
			description: "",
			docstring: expect.stringContaining("@param first - Kept."),
			isAsync: false,
		});
	});

	test("toString", () => {
		expect(sig.toString()).toBe(
			"Signature(name='exampleFunction', parameters=3, description='Example function.')",
		);
	});
});
