export {
	type EvaluatedExpression,
	describeExpressionType,
	describeTypeNode,
	evaluateExpression,
	resolveMemberTypeNode,
} from "./annotations.ts";
export {
	type ClassData,
	ClassMetadata,
	type ClassMetadataOptions,
} from "./class-metadata.ts";
export {
	type ConfigInput,
	configSchema,
	defaultConfig,
	resolveConfig,
} from "./config.ts";
export {
	AlreadyInitializedError,
	IndexOutOfRangeError,
	InspectError,
	InvalidKeyTypeError,
	NotFoundError,
	NotInitializedError,
	UnsupportedObjectError,
} from "./errors.ts";
export { type FilterConfig, MemberFilter, defaultFilter } from "./filter.ts";
export {
	type AnyFunction,
	FunctionMetadata,
	isClassValue,
	isThenable,
} from "./function.ts";
export {
	type InspectOptions,
	type InspectResult,
	Inspector,
	inspectedKind,
} from "./inspector.ts";
export {
	type DocCommentParser,
	type DocParam,
	JSDocParser,
	type ParsedDocComment,
	defaultDocParser,
	docDescription,
	emptyDocComment,
	getDocComment,
	getDocCommentText,
} from "./jsdoc.ts";
export {
	type ClassMemberNode,
	type HierarchyLevel,
	type HierarchySnapshot,
	type MemberClassification,
	type MemberData,
	MemberKind,
	Method,
	Visibility,
	classifyMember,
	createMethod,
	memberKind,
	memberNames,
	memberVisibility,
	ownMembers,
	snapshotHierarchy,
} from "./member.ts";
export {
	Parameter,
	type ParameterData,
	ParameterKind,
	type ParameterOptions,
	SourceExpression,
} from "./parameter.ts";
export { type Selector, selectEntry } from "./select.ts";
export {
	type FunctionLikeNode,
	Signature,
	type SignatureData,
	type SignatureOptions,
	type SignatureParts,
	declarationName,
	extractSignature,
	extractSignatureParts,
	isFunctionLike,
} from "./signature.ts";
export {
	type EnumType,
	type GenericType,
	type LiteralType,
	type LiteralValue,
	type PlainType,
	type TypeDescriptor,
	type TypeDescriptorData,
	type TypeDescriptorKind,
	type UnionType,
	UNSET,
	Unset,
	enumOf,
	generic,
	isUnset,
	literalOf,
	plain,
	typeOfValue,
	typeToData,
} from "./type-descriptor.ts";
export {
	flattenUnion,
	getChoices,
	getEnumChoices,
	getLiteralChoices,
	isDirectLiteral,
	isEnum,
	isGenericContainer,
	isIterableType,
	isMappingType,
	isOrContainsLiteral,
	isUnion,
	literalContains,
	renderName,
	simplifiedName,
	simplify,
	typeArgs,
	typeOrigin,
	unionOf,
} from "./type-taxonomy.ts";
export type { Config, InspectedKind } from "./types.ts";
