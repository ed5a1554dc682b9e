import { type JSDoc, type JSDocTag, Node } from "ts-morph";

export type DocParam = {
	name: string;
	description: string;
};

export type ParsedDocComment = {
	shortDescription: string;
	longDescription: string;
	params: DocParam[];
	returns: string;
};

/**
 * Turns a doc comment into descriptions.
 * A missing comment gives an empty result, never an error.
 */
export interface DocCommentParser {
	parse(doc: JSDoc | undefined): ParsedDocComment;
}

export function emptyDocComment(): ParsedDocComment {
	return { shortDescription: "", longDescription: "", params: [], returns: "" };
}

export function docDescription(doc: ParsedDocComment): string {
	return doc.shortDescription || doc.longDescription;
}

function trimLines(text: string): string {
	return text
		.split(/\r?\n/)
		.map((line) => line.trim())
		.join("\n")
		.trim();
}

function splitParagraphs(text: string): string[] {
	return trimLines(text)
		.split(/\n{2,}/)
		.filter((paragraph) => paragraph.length > 0);
}

// `@param name - text` keeps the separator in the tag comment
function tagComment(tag: JSDocTag): string {
	return trimLines(tag.getCommentText() ?? "").replace(/^-\s*/, "");
}

/**
 * Reads the description and the `@param`/`@arg`/`@argument` and `@returns`
 * tags the compiler parsed out of a JSDoc block. Types in braces, bracketed
 * optional names and dotted names (`opts.key`) come through as the compiler
 * reads them.
 */
export class JSDocParser implements DocCommentParser {
	parse(doc: JSDoc | undefined): ParsedDocComment {
		const result = emptyDocComment();
		if (!doc) return result;

		const [short = "", ...rest] = splitParagraphs(doc.getDescription());
		result.shortDescription = short;
		result.longDescription = rest.join("\n\n");

		for (const tag of doc.getTags()) {
			if (Node.isJSDocParameterTag(tag)) {
				result.params.push({ name: tag.getName(), description: tagComment(tag) });
			} else if (Node.isJSDocReturnTag(tag)) {
				result.returns = tagComment(tag);
			}
		}

		return result;
	}
}

export const defaultDocParser: DocCommentParser = new JSDocParser();

/**
 * The doc comment attached to a declaration, if any (the last one when there
 * are several). For a function assigned to a variable the comment sits on the
 * variable statement.
 */
export function getDocComment(node: Node): JSDoc | undefined {
	let target: Node | undefined = node;
	if (Node.isArrowFunction(node) || Node.isFunctionExpression(node)) {
		const parent = node.getParent();
		if (Node.isVariableDeclaration(parent)) {
			target = parent.getVariableStatement();
		}
	} else if (Node.isVariableDeclaration(node)) {
		target = node.getVariableStatement();
	}

	if (!target || !Node.isJSDocable(target)) return undefined;
	const docs = target.getJsDocs();
	return docs[docs.length - 1];
}

/** Raw text of {@link getDocComment} */
export function getDocCommentText(node: Node): string | undefined {
	return getDocComment(node)?.getText();
}
