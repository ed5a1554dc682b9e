import {
	type ClassDeclaration,
	type ConstructorDeclaration,
	type GetAccessorDeclaration,
	type MethodDeclaration,
	Node,
	Scope,
	type SetAccessorDeclaration,
} from "ts-morph";
import {
	Signature,
	type SignatureData,
	type SignatureOptions,
	type SignatureParts,
	extractSignatureParts,
} from "./signature.ts";

export enum MemberKind {
	Instance = "instance",
	Static = "static",
	/** A static method declaring a `this:` parameter, i.e. bound to the class it is called on */
	Class = "class",
	Property = "property",
}

export enum Visibility {
	Public = "public",
	Protected = "protected",
	Private = "private",
}

export type ClassMemberNode =
	| MethodDeclaration
	| ConstructorDeclaration
	| GetAccessorDeclaration
	| SetAccessorDeclaration;

export type HierarchyLevel = {
	readonly name: string;
	readonly declaration: ClassDeclaration;
	/** Members declared directly on this class, in source order */
	readonly members: ReadonlyMap<string, ClassMemberNode>;
};

/** Base-class chain, most-derived first */
export type HierarchySnapshot = readonly HierarchyLevel[];

export type MemberClassification = {
	kind: MemberKind;
	visibility: Visibility;
	inherited: boolean;
	/** Name of the class whose declaration was found first */
	definedIn: string;
	declaration: ClassMemberNode;
};

export const CONSTRUCTOR_NAME = "constructor";

/**
 * Callable members declared directly on a class. For overloaded members the
 * implementation (the declaration with a body) is kept.
 */
export function ownMembers(cls: ClassDeclaration): Map<string, ClassMemberNode> {
	const members = new Map<string, ClassMemberNode>();

	for (const member of cls.getMembers()) {
		let name: string;
		if (Node.isConstructorDeclaration(member)) {
			name = CONSTRUCTOR_NAME;
		} else if (
			Node.isMethodDeclaration(member) ||
			Node.isGetAccessorDeclaration(member) ||
			Node.isSetAccessorDeclaration(member)
		) {
			name = member.getName();
		} else {
			continue;
		}

		const existing = members.get(name);
		if (!existing || (!existing.hasBody() && member.hasBody())) {
			members.set(name, member);
		}
	}

	return members;
}

export function snapshotHierarchy(cls: ClassDeclaration): HierarchySnapshot {
	const levels: HierarchyLevel[] = [];
	const visited = new Set<ClassDeclaration>();
	let current: ClassDeclaration | undefined = cls;

	while (current && !visited.has(current)) {
		visited.add(current);
		levels.push(
			Object.freeze({
				name: current.getName() ?? "default",
				declaration: current,
				members: ownMembers(current),
			}),
		);
		current = current.getBaseClass();
	}

	return Object.freeze(levels);
}

export function memberKind(node: ClassMemberNode): MemberKind {
	if (Node.isGetAccessorDeclaration(node) || Node.isSetAccessorDeclaration(node)) {
		return MemberKind.Property;
	}
	if (Node.isMethodDeclaration(node) && node.isStatic()) {
		const first = node.getParameters()[0];
		return first?.getName() === "this" ? MemberKind.Class : MemberKind.Static;
	}
	return MemberKind.Instance;
}

export function memberVisibility(name: string, node: ClassMemberNode): Visibility {
	if (name.startsWith("#")) return Visibility.Private;

	const scope = node.getScope();
	if (scope === Scope.Private) return Visibility.Private;
	if (scope === Scope.Protected) return Visibility.Protected;

	const dunder = /^__.+__$/.test(name);
	if (name.startsWith("_") && !dunder) return Visibility.Protected;
	return Visibility.Public;
}

/**
 * Classify one member against a hierarchy snapshot. The first level (most
 * derived) declaring `name` decides its kind and visibility; it is inherited
 * when the first level of the snapshot does not declare it itself.
 */
export function classifyMember(
	name: string,
	hierarchy: HierarchySnapshot,
): MemberClassification | undefined {
	for (const [index, level] of hierarchy.entries()) {
		const declaration = level.members.get(name);
		if (!declaration) continue;
		return {
			kind: memberKind(declaration),
			visibility: memberVisibility(name, declaration),
			inherited: index > 0,
			definedIn: level.name,
			declaration,
		};
	}
	return undefined;
}

/** Every member name reachable through the hierarchy, most-derived level first */
export function memberNames(hierarchy: HierarchySnapshot): string[] {
	const names = new Set<string>();
	for (const level of hierarchy) {
		for (const name of level.members.keys()) names.add(name);
	}
	return [...names];
}

export type MemberData = SignatureData & {
	owner: string;
	definedIn: string;
	kind: MemberKind;
	visibility: Visibility;
	inherited: boolean;
};

/**
 * A class member: its signature plus where it was declared and how it is bound.
 */
export class Method extends Signature {
	/** Class the member was looked up on */
	readonly owner: string;
	readonly definedIn: string;
	readonly kind: MemberKind;
	readonly visibility: Visibility;
	readonly isInherited: boolean;
	readonly declaration: ClassMemberNode;

	constructor(
		parts: SignatureParts,
		classification: MemberClassification,
		owner: string,
	) {
		super(parts);
		this.owner = owner;
		this.definedIn = classification.definedIn;
		this.kind = classification.kind;
		this.visibility = classification.visibility;
		this.isInherited = classification.inherited;
		this.declaration = classification.declaration;
	}

	get isConstructor(): boolean {
		return this.name === CONSTRUCTOR_NAME;
	}

	get isStatic(): boolean {
		return this.kind === MemberKind.Static;
	}

	get isClassMethod(): boolean {
		return this.kind === MemberKind.Class;
	}

	/** Static or class method: callable without an instance */
	get isClassLevel(): boolean {
		return this.isStatic || this.isClassMethod;
	}

	get isProperty(): boolean {
		return this.kind === MemberKind.Property;
	}

	get isPublic(): boolean {
		return this.visibility === Visibility.Public;
	}

	get isProtected(): boolean {
		return this.visibility === Visibility.Protected;
	}

	get isPrivate(): boolean {
		return this.visibility === Visibility.Private;
	}

	override render(): string {
		let prefix = "";
		if (this.isClassLevel) prefix = "static ";
		else if (Node.isSetAccessorDeclaration(this.declaration)) prefix = "set ";
		else if (this.isProperty) prefix = "get ";
		return `${prefix}${super.render()}`;
	}

	override toData(): MemberData {
		return {
			...super.toData(),
			owner: this.owner,
			definedIn: this.definedIn,
			kind: this.kind,
			visibility: this.visibility,
			inherited: this.isInherited,
		};
	}
}

/**
 * Build the {@link Method} for `name` as seen from the first class of the snapshot.
 */
export function createMethod(
	name: string,
	hierarchy: HierarchySnapshot,
	options: SignatureOptions = {},
): Method | undefined {
	const classification = classifyMember(name, hierarchy);
	if (!classification) return undefined;
	const owner = hierarchy[0]?.name ?? classification.definedIn;
	return new Method(
		extractSignatureParts(classification.declaration, { ...options, name }),
		classification,
		owner,
	);
}
