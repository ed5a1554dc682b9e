import {
	type ArrowFunction,
	type ConstructorDeclaration,
	type Expression,
	type FunctionDeclaration,
	type FunctionExpression,
	type GetAccessorDeclaration,
	type MethodDeclaration,
	Node,
	type ParameterDeclaration,
	type SetAccessorDeclaration,
} from "ts-morph";
import {
	describeExpressionType,
	describeTypeNode,
	evaluateExpression,
	propertyKey,
	resolveMemberTypeNode,
} from "./annotations.ts";
import {
	type DocCommentParser,
	type ParsedDocComment,
	defaultDocParser,
	docDescription,
	getDocComment,
} from "./jsdoc.ts";
import {
	Parameter,
	type ParameterData,
	ParameterKind,
	SourceExpression,
} from "./parameter.ts";
import { UnsupportedObjectError } from "./errors.ts";
import { selectEntry } from "./select.ts";
import {
	type TypeDescriptor,
	type TypeDescriptorData,
	UNSET,
	isUnset,
	typeToData,
} from "./type-descriptor.ts";
import { renderName } from "./type-taxonomy.ts";

export type FunctionLikeNode =
	| FunctionDeclaration
	| FunctionExpression
	| ArrowFunction
	| MethodDeclaration
	| ConstructorDeclaration
	| GetAccessorDeclaration
	| SetAccessorDeclaration;

export function isFunctionLike(node: Node): node is FunctionLikeNode {
	return (
		Node.isFunctionDeclaration(node) ||
		Node.isFunctionExpression(node) ||
		Node.isArrowFunction(node) ||
		Node.isMethodDeclaration(node) ||
		Node.isConstructorDeclaration(node) ||
		Node.isGetAccessorDeclaration(node) ||
		Node.isSetAccessorDeclaration(node)
	);
}

export type SignatureOptions = {
	/** Drop a leading `this:` parameter. Defaults to true. */
	skipThis?: boolean;
	/** Infer missing parameter types from default values. Defaults to true. */
	inferTypes?: boolean;
	/** Read descriptions from the doc comment. Defaults to true. */
	includeJSDoc?: boolean;
	docParser?: DocCommentParser;
	/** Name to use instead of the one found on the declaration */
	name?: string;
};

/**
 * Everything a {@link Signature} is built from. Extraction fills this in
 * completely before any Signature exists.
 */
export type SignatureParts = {
	name: string;
	params: readonly Parameter[];
	returnType: TypeDescriptor;
	docstring: string | undefined;
	doc: ParsedDocComment;
	isAsync: boolean;
	/** Evaluated object default of each destructured parameter, by position */
	bindingDefaults?: ReadonlyMap<number, Readonly<Record<string, unknown>>>;
};

export type SignatureData = {
	name: string;
	parameters: ParameterData[];
	returnType: TypeDescriptorData;
	description: string;
	docstring: string | null;
	isAsync: boolean;
};

/**
 * Ordered parameters and return type of one callable. Immutable.
 */
export class Signature {
	readonly name: string;
	readonly params: readonly Parameter[];
	readonly returnType: TypeDescriptor;
	/** Raw doc comment text */
	readonly docstring: string | undefined;
	readonly doc: ParsedDocComment;
	readonly isAsync: boolean;

	private readonly paramsByName: ReadonlyMap<string, Parameter>;
	private readonly bindingDefaults: ReadonlyMap<number, Readonly<Record<string, unknown>>>;

	constructor(parts: SignatureParts) {
		this.name = parts.name;
		this.params = Object.freeze([...parts.params]);
		this.returnType = parts.returnType;
		this.docstring = parts.docstring;
		this.doc = parts.doc;
		this.isAsync = parts.isAsync;
		this.paramsByName = new Map(this.params.map((p) => [p.name, p]));
		this.bindingDefaults = parts.bindingDefaults ?? new Map();
	}

	get hasDocstring(): boolean {
		return this.docstring !== undefined && this.docstring.length > 0;
	}

	get description(): string {
		return docDescription(this.doc);
	}

	/**
	 * Retrieve a parameter by name or by index.
	 * @throws NotFoundError, IndexOutOfRangeError, InvalidKeyTypeError
	 */
	getParam(key: string | number): Parameter {
		return selectEntry(key, this.paramsByName, this.params, `${this.name}()`);
	}

	/**
	 * Arrange a name → value map into the argument list this callable expects.
	 * Keyword-only entries are gathered into the object at their parameter's
	 * position, on top of that parameter's object default; a rest parameter's
	 * value is spread. Missing names are left `undefined` so declared defaults
	 * apply, and an object nobody supplied a key for is left out.
	 */
	toCallArguments(values: Readonly<Record<string, unknown>>): unknown[] {
		const args: unknown[] = [];
		const keywordBags = new Map<number, Record<string, unknown>>();
		let rest: unknown[] = [];
		let restPosition = 0;

		const bagAt = (position: number): Record<string, unknown> => {
			let bag = keywordBags.get(position);
			if (!bag) {
				bag = { ...this.bindingDefaults.get(position) };
				keywordBags.set(position, bag);
			}
			return bag;
		};

		for (const param of this.params) {
			if (param.name === "this") continue;
			const supplied = Object.hasOwn(values, param.name);
			const value = values[param.name];

			switch (param.kind) {
				case ParameterKind.POSITIONAL_ONLY:
				case ParameterKind.POSITIONAL_OR_KEYWORD:
					args[param.position] = value;
					break;
				case ParameterKind.VAR_POSITIONAL:
					rest = Array.isArray(value) ? value : supplied ? [value] : [];
					restPosition = param.position;
					break;
				case ParameterKind.KEYWORD_ONLY:
					if (supplied) bagAt(param.position)[param.name] = value;
					break;
				case ParameterKind.VAR_KEYWORD:
					if (value !== null && typeof value === "object") {
						Object.assign(bagAt(param.position), value);
					}
					break;
			}
		}

		for (const [position, bag] of keywordBags) {
			args[position] = bag;
		}
		// rest values start at their own position even when earlier slots are empty
		if (rest.length > 0 && args.length < restPosition) {
			args.length = restPosition;
		}
		return [...Array.from(args), ...rest];
	}

	render(): string {
		const params = this.params.map((p) => p.render()).join(", ");
		const returns = isUnset(this.returnType)
			? ""
			: `: ${renderName(this.returnType)}`;
		return `${this.isAsync ? "async " : ""}${this.name}(${params})${returns}`;
	}

	toData(): SignatureData {
		return {
			name: this.name,
			parameters: this.params.map((p) => p.toData()),
			returnType: typeToData(this.returnType),
			description: this.description,
			docstring: this.docstring ?? null,
			isAsync: this.isAsync,
		};
	}

	toString(): string {
		return `${this.constructor.name}(name='${this.name}', parameters=${this.params.length}, description='${this.description}')`;
	}
}

export function declarationName(node: FunctionLikeNode): string {
	if (Node.isConstructorDeclaration(node)) return "constructor";
	if (Node.isArrowFunction(node) || Node.isFunctionExpression(node)) {
		const parent = node.getParent();
		if (Node.isVariableDeclaration(parent) || Node.isPropertyDeclaration(parent)) {
			return parent.getName();
		}
		if (Node.isFunctionExpression(node)) {
			return node.getName() ?? "anonymous";
		}
		return "anonymous";
	}
	return node.getName() ?? "default";
}

function defaultValue(initializer: Expression | undefined): unknown {
	if (!initializer) return UNSET;
	const result = evaluateExpression(initializer);
	if (result.evaluated) return result.value;
	return new SourceExpression(
		initializer.getText(),
		describeExpressionType(initializer),
	);
}

function objectDefaults(
	initializer: Expression | undefined,
): Record<string, unknown> | undefined {
	if (!initializer) return undefined;
	const result = evaluateExpression(initializer);
	if (!result.evaluated) return undefined;
	const value = result.value;
	return value !== null && typeof value === "object" && !Array.isArray(value)
		? { ...value }
		: undefined;
}

function expandParameter(
	param: ParameterDeclaration,
	position: number,
	inferType: boolean,
	fallbacks: Readonly<Record<string, unknown>> = {},
): Parameter[] {
	const nameNode = param.getNameNode();
	const typeNode = param.getTypeNode();

	if (Node.isObjectBindingPattern(nameNode)) {
		return nameNode.getElements().map((element) => {
			const propertyName = element.getPropertyNameNode();
			const key = propertyName ? propertyKey(propertyName) : element.getName();
			if (element.getDotDotDotToken()) {
				return new Parameter({
					name: element.getName(),
					kind: ParameterKind.VAR_KEYWORD,
					position,
					inferType,
				});
			}
			const initializer = element.getInitializer();
			const fallback = Object.hasOwn(fallbacks, key)
				? { default: fallbacks[key] }
				: {};
			return new Parameter({
				name: key,
				kind: ParameterKind.KEYWORD_ONLY,
				type: describeTypeNode(resolveMemberTypeNode(typeNode, key)),
				...(initializer ? { default: defaultValue(initializer) } : fallback),
				position,
				inferType,
			});
		});
	}

	const kind = param.isRestParameter()
		? ParameterKind.VAR_POSITIONAL
		: Node.isArrayBindingPattern(nameNode)
			? ParameterKind.POSITIONAL_ONLY
			: ParameterKind.POSITIONAL_OR_KEYWORD;

	const initializer = param.getInitializer();
	// `b?: T` behaves like `b: T = undefined`
	const defaults = initializer
		? { default: defaultValue(initializer) }
		: param.hasQuestionToken()
			? { default: undefined }
			: {};

	return [
		new Parameter({
			name: param.getName().replace(/\s+/g, " "),
			kind,
			type: describeTypeNode(typeNode),
			...defaults,
			position,
			inferType,
		}),
	];
}

/**
 * Map of parameter name → description, keeping the first non-empty entry per
 * name. `opts.key` entries also answer for `key`.
 */
function descriptionsByName(doc: ParsedDocComment): Map<string, string> {
	const descriptions = new Map<string, string>();
	for (const { name, description } of doc.params) {
		if (!description) continue;
		const keys = name.includes(".") ? [name, name.slice(name.lastIndexOf(".") + 1)] : [name];
		for (const key of keys) {
			if (!descriptions.has(key)) descriptions.set(key, description);
		}
	}
	return descriptions;
}

/**
 * Read one callable's declaration: parameters in source order, doc-comment
 * descriptions folded in by name, and the declared return type.
 */
export function extractSignatureParts(
	node: FunctionLikeNode,
	options: SignatureOptions = {},
): SignatureParts {
	const skipThis = options.skipThis ?? true;
	const inferType = options.inferTypes ?? true;
	const parser = options.docParser ?? defaultDocParser;

	const params: Parameter[] = [];
	const bindingDefaults = new Map<number, Record<string, unknown>>();
	let position = 0;
	for (const param of node.getParameters()) {
		if (param.getName() === "this") {
			if (!skipThis) {
				params.push(
					new Parameter({
						name: "this",
						kind: ParameterKind.POSITIONAL_ONLY,
						type: describeTypeNode(param.getTypeNode()),
						position: -1,
						inferType,
					}),
				);
			}
			continue;
		}
		const fallbacks = Node.isObjectBindingPattern(param.getNameNode())
			? objectDefaults(param.getInitializer())
			: undefined;
		if (fallbacks) bindingDefaults.set(position, fallbacks);
		params.push(...expandParameter(param, position, inferType, fallbacks));
		position++;
	}

	const seen = new Set<string>();
	for (const param of params) {
		if (seen.has(param.name)) {
			throw new UnsupportedObjectError(
				`Parameter '${param.name}' is declared more than once in ${options.name ?? declarationName(node)}()`,
			);
		}
		seen.add(param.name);
	}

	const jsDoc = options.includeJSDoc === false ? undefined : getDocComment(node);
	const docstring = jsDoc?.getText();
	const doc = parser.parse(jsDoc);

	const descriptions = descriptionsByName(doc);
	const described = params.map((param) => {
		const description = descriptions.get(param.name);
		return description ? param.withDescription(description) : param;
	});

	return {
		name: options.name ?? declarationName(node),
		params: described,
		returnType: Node.isReturnTyped(node)
			? describeTypeNode(node.getReturnTypeNode())
			: UNSET,
		docstring,
		doc,
		isAsync: Node.isAsyncable(node) && node.isAsync(),
		bindingDefaults,
	};
}

export function extractSignature(
	node: FunctionLikeNode,
	options: SignatureOptions = {},
): Signature {
	return new Signature(extractSignatureParts(node, options));
}
