import {
	type Expression,
	Node,
	type PropertySignature,
	SyntaxKind,
	type TypeNode,
	type TypeReferenceNode,
} from "ts-morph";
import {
	type LiteralValue,
	type TypeDescriptor,
	UNSET,
	enumOf,
	generic,
	literalOf,
	plain,
} from "./type-descriptor.ts";
import { flattenUnion, isDirectLiteral, unionOf } from "./type-taxonomy.ts";

/**
 * Read a type annotation into a {@link TypeDescriptor}.
 *
 * This is where unions are normalised: nested unions flatten, repeated branches
 * collapse (`X | X` → `X`), and a union made only of literals becomes one literal.
 * Non-generic type aliases are expanded; enums resolve to their member names.
 */
export function describeTypeNode(node: TypeNode | undefined): TypeDescriptor {
	if (!node) return UNSET;
	return describe(node, new Set());
}

function describe(node: Node, aliases: ReadonlySet<string>): TypeDescriptor {
	if (Node.isParenthesizedTypeNode(node)) {
		return describe(node.getTypeNode(), aliases);
	}

	if (Node.isUnionTypeNode(node)) {
		return normalizeUnion(
			node.getTypeNodes().map((branch) => describe(branch, aliases)),
		);
	}

	if (Node.isLiteralTypeNode(node)) {
		return describeLiteral(node.getLiteral());
	}

	if (Node.isArrayTypeNode(node)) {
		return generic("Array", [describe(node.getElementTypeNode(), aliases)]);
	}

	if (Node.isTupleTypeNode(node)) {
		return generic(
			"tuple",
			node
				.getElements()
				.map((element) =>
					describe(
						Node.isNamedTupleMember(element) ? element.getTypeNode() : element,
						aliases,
					),
				),
		);
	}

	if (
		Node.isTypeOperatorTypeNode(node) &&
		node.getOperator() === SyntaxKind.ReadonlyKeyword
	) {
		return describe(node.getTypeNode(), aliases);
	}

	if (Node.isTypeReference(node)) {
		return describeReference(node, aliases);
	}

	return plain(collapseWhitespace(node.getText()));
}

function normalizeUnion(branches: TypeDescriptor[]): TypeDescriptor {
	const flat = flattenUnion(unionOf(branches));
	if (flat.length === 1) return flat[0];
	const literals = flat.filter(isDirectLiteral);
	if (literals.length === flat.length) {
		return literalOf(literals.flatMap((branch) => branch.values));
	}
	if (literals.length < 2) return unionOf(flat);

	// Merge literal branches into one, placed where the first one was
	const merged = literalOf(literals.flatMap((branch) => branch.values));
	const first = flat.findIndex(isDirectLiteral);
	const others = flat.filter((branch) => !isDirectLiteral(branch));
	return unionOf([...others.slice(0, first), merged, ...others.slice(first)]);
}

function describeLiteral(literal: Node): TypeDescriptor {
	const value = literalValue(literal);
	if (value === null) return plain("null");
	if (value === undefined) return plain(collapseWhitespace(literal.getText()));
	return literalOf([value]);
}

/**
 * Value of a literal node. `null` for the null literal, `undefined` when the
 * node is not a simple literal.
 */
function literalValue(node: Node): LiteralValue | null | undefined {
	if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
		return node.getLiteralValue();
	}
	if (Node.isNumericLiteral(node)) return node.getLiteralValue();
	if (Node.isBigIntLiteral(node)) return BigInt(node.getText().slice(0, -1));

	switch (node.getKind()) {
		case SyntaxKind.TrueKeyword:
			return true;
		case SyntaxKind.FalseKeyword:
			return false;
		case SyntaxKind.NullKeyword:
			return null;
	}

	if (
		Node.isPrefixUnaryExpression(node) &&
		node.getOperatorToken() === SyntaxKind.MinusToken
	) {
		const operand = literalValue(node.getOperand());
		if (typeof operand === "number") return -operand;
		if (typeof operand === "bigint") return -operand;
	}
	return undefined;
}

function describeReference(
	node: TypeReferenceNode,
	aliases: ReadonlySet<string>,
): TypeDescriptor {
	const name = node.getTypeName().getText();
	const typeArguments = node.getTypeArguments();

	if (typeArguments.length > 0) {
		return generic(
			name,
			typeArguments.map((arg) => describe(arg, aliases)),
		);
	}

	const declaration = resolveDeclaration(node);
	if (declaration && Node.isEnumDeclaration(declaration)) {
		return enumOf(
			declaration.getName(),
			declaration.getMembers().map((member) => member.getName()),
		);
	}

	if (
		declaration &&
		Node.isTypeAliasDeclaration(declaration) &&
		declaration.getTypeParameters().length === 0 &&
		!aliases.has(name)
	) {
		const target = declaration.getTypeNode();
		if (target) return describe(target, new Set([...aliases, name]));
	}

	return plain(name);
}

/**
 * Annotation of property `key` on an object type, following interfaces and
 * type aliases. Used for the elements of an object-destructured parameter.
 */
export function resolveMemberTypeNode(
	node: TypeNode | undefined,
	key: string,
	depth = 0,
): TypeNode | undefined {
	if (!node || depth > 8) return undefined;

	const named = (member: PropertySignature) => propertyKey(member.getNameNode()) === key;
	if (Node.isTypeLiteral(node)) {
		return node.getProperty(named)?.getTypeNode();
	}
	if (Node.isParenthesizedTypeNode(node)) {
		return resolveMemberTypeNode(node.getTypeNode(), key, depth + 1);
	}
	if (!Node.isTypeReference(node)) return undefined;

	const declaration = resolveDeclaration(node);
	if (declaration && Node.isInterfaceDeclaration(declaration)) {
		return declaration.getProperty(named)?.getTypeNode();
	}
	if (declaration && Node.isTypeAliasDeclaration(declaration)) {
		return resolveMemberTypeNode(declaration.getTypeNode(), key, depth + 1);
	}
	return undefined;
}

/** Property name as written, without quotes: `"my-key"` → `my-key`, `1` → `1` */
export function propertyKey(node: Node): string {
	if (Node.isStringLiteral(node) || Node.isNumericLiteral(node)) {
		return String(node.getLiteralValue());
	}
	return node.getText();
}

function resolveDeclaration(node: TypeReferenceNode): Node | undefined {
	const symbol = node.getTypeName().getSymbol();
	if (!symbol) return undefined;
	const target = symbol.isAlias() ? symbol.getAliasedSymbol() : symbol;
	return target?.getDeclarations()[0];
}

/**
 * Type of an expression that could not be evaluated statically, as the checker
 * sees it with literal types widened (`"a"` → `string`, `Color.Red` → `Color`).
 */
export function describeExpressionType(expression: Expression): TypeDescriptor {
	if (Node.isNewExpression(expression)) {
		return plain(expression.getExpression().getText());
	}
	if (Node.isArrayLiteralExpression(expression)) return plain("Array");
	if (Node.isArrowFunction(expression) || Node.isFunctionExpression(expression)) {
		return plain("Function");
	}
	if (Node.isRegularExpressionLiteral(expression)) return plain("RegExp");
	if (Node.isTemplateExpression(expression)) return plain("string");

	const type = expression.getType();
	const widened =
		type.isLiteral() || type.isBooleanLiteral() || type.isEnumLiteral()
			? type.getBaseTypeOfLiteralType()
			: type;

	const declaration = widened.getSymbol()?.getDeclarations()[0];
	if (declaration && Node.isEnumDeclaration(declaration)) {
		return enumOf(
			declaration.getName(),
			declaration.getMembers().map((member) => member.getName()),
		);
	}
	return plain(collapseWhitespace(widened.getText(expression)));
}

export type EvaluatedExpression =
	| { evaluated: true; value: unknown }
	| { evaluated: false };

const NOT_EVALUATED: EvaluatedExpression = { evaluated: false };

/**
 * Evaluate a default-value expression when it is built only from literals,
 * arrays and object literals. Anything else is left to the caller.
 */
export function evaluateExpression(expression: Node): EvaluatedExpression {
	if (
		Node.isParenthesizedExpression(expression) ||
		Node.isAsExpression(expression) ||
		Node.isSatisfiesExpression(expression)
	) {
		return evaluateExpression(expression.getExpression());
	}

	if (Node.isIdentifier(expression) && expression.getText() === "undefined") {
		return { evaluated: true, value: undefined };
	}

	const value = literalValue(expression);
	if (value !== undefined) return { evaluated: true, value };

	if (Node.isArrayLiteralExpression(expression)) {
		const items: unknown[] = [];
		for (const element of expression.getElements()) {
			const item = evaluateExpression(element);
			if (!item.evaluated) return NOT_EVALUATED;
			items.push(item.value);
		}
		return { evaluated: true, value: items };
	}

	if (Node.isObjectLiteralExpression(expression)) {
		const record: Record<string, unknown> = {};
		for (const property of expression.getProperties()) {
			if (!Node.isPropertyAssignment(property)) return NOT_EVALUATED;
			const nameNode = property.getNameNode();
			if (!Node.isIdentifier(nameNode) && !Node.isStringLiteral(nameNode)) {
				return NOT_EVALUATED;
			}
			const initializer = property.getInitializer();
			if (!initializer) return NOT_EVALUATED;
			const item = evaluateExpression(initializer);
			if (!item.evaluated) return NOT_EVALUATED;
			record[
				Node.isStringLiteral(nameNode) ? nameNode.getLiteralValue() : nameNode.getText()
			] = item.value;
		}
		return { evaluated: true, value: record };
	}

	return NOT_EVALUATED;
}

function collapseWhitespace(text: string): string {
	return text.replace(/\s+/g, " ").trim();
}
