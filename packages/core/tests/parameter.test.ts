import { describe, expect, test } from "vitest";
import {
	Parameter,
	ParameterKind,
	SourceExpression,
	UNSET,
	literalOf,
	plain,
} from "../lib/index.ts";

describe("Parameter", () => {
	test("infers the type from the default value", () => {
		const param = new Parameter({
			name: "retries",
			kind: ParameterKind.POSITIONAL_OR_KEYWORD,
			default: 5,
		});
		expect(param.type).toEqual(plain("number"));
		expect(param.isTyped).toBe(true);
		expect(param.hasDefault).toBe(true);
		expect(param.isOptional).toBe(true);
		expect(param.isRequired).toBe(false);
		expect(param.render()).toBe("retries: number = 5");
	});

	test("keeps a declared type over the default's", () => {
		const param = new Parameter({
			name: "mode",
			kind: ParameterKind.POSITIONAL_OR_KEYWORD,
			type: literalOf(["a", "b"]),
			default: "a",
		});
		expect(param.type).toEqual(literalOf(["a", "b"]));
		expect(param.render()).toBe('mode: "a" | "b" = "a"');
	});

	test("does not infer when disabled", () => {
		const param = new Parameter({
			name: "x",
			kind: ParameterKind.POSITIONAL_OR_KEYWORD,
			default: 5,
			inferType: false,
		});
		expect(param.type).toBe(UNSET);
		expect(param.isTyped).toBe(false);
		expect(param.render()).toBe("x = 5");
	});

	test("an undefined default counts as a default but infers nothing", () => {
		const param = new Parameter({
			name: "x",
			kind: ParameterKind.POSITIONAL_OR_KEYWORD,
			default: undefined,
		});
		expect(param.type).toBe(UNSET);
		expect(param.hasDefault).toBe(true);
	});

	test("a null default infers the null type", () => {
		const param = new Parameter({
			name: "b",
			kind: ParameterKind.POSITIONAL_OR_KEYWORD,
			default: null,
		});
		expect(param.type).toEqual(plain("null"));
		expect(param.render()).toBe("b: null = null");
	});

	test("a parameter without default is required", () => {
		const param = new Parameter({ name: "a", kind: ParameterKind.POSITIONAL_OR_KEYWORD });
		expect(param.default).toBe(UNSET);
		expect(param.hasDefault).toBe(false);
		expect(param.isRequired).toBe(true);
		expect(param.render()).toBe("a");
		expect(param.toData()).toEqual({
			name: "a",
			kind: "POSITIONAL_OR_KEYWORD",
			type: { kind: "unset" },
			default: null,
			description: null,
		});
	});

	test("source expressions carry their own type", () => {
		const param = new Parameter({
			name: "when",
			kind: ParameterKind.POSITIONAL_OR_KEYWORD,
			default: new SourceExpression("new Date()", plain("Date")),
		});
		expect(param.type).toEqual(plain("Date"));
		expect(param.render()).toBe("when: Date = new Date()");
	});

	test("rest parameters render with a spread", () => {
		const param = new Parameter({ name: "tags", kind: ParameterKind.VAR_POSITIONAL });
		expect(param.render()).toBe("...tags");
	});

	test("withDescription returns a new parameter", () => {
		const param = new Parameter({
			name: "a",
			kind: ParameterKind.KEYWORD_ONLY,
			default: 1,
			position: 2,
		});
		const described = param.withDescription("The first one.");
		expect(described).not.toBe(param);
		expect(param.description).toBeUndefined();
		expect(described.description).toBe("The first one.");
		expect(described.type).toEqual(plain("number"));
		expect(described.default).toBe(1);
		expect(described.position).toBe(2);
		expect(described.kind).toBe(ParameterKind.KEYWORD_ONLY);
	});
});
