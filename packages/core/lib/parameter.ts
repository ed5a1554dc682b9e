import {
	type TypeDescriptor,
	type TypeDescriptorData,
	UNSET,
	isUnset,
	typeOfValue,
	typeToData,
} from "./type-descriptor.ts";
import { renderName } from "./type-taxonomy.ts";

export enum ParameterKind {
	/** Bound only by position (array-destructured parameter) */
	POSITIONAL_ONLY = "POSITIONAL_ONLY",
	/** An ordinary parameter */
	POSITIONAL_OR_KEYWORD = "POSITIONAL_OR_KEYWORD",
	/** `...rest` */
	VAR_POSITIONAL = "VAR_POSITIONAL",
	/** A property of an object-destructured parameter */
	KEYWORD_ONLY = "KEYWORD_ONLY",
	/** `...rest` inside an object-destructured parameter */
	VAR_KEYWORD = "VAR_KEYWORD",
}

/**
 * A default value that exists only as source text, e.g. `new Date()` or
 * `Defaults.timeout`. The checker's (widened) type of the expression is kept
 * for inference.
 */
export class SourceExpression {
	constructor(
		readonly text: string,
		readonly type: TypeDescriptor,
	) {}

	toString(): string {
		return this.text;
	}
}

export type ParameterOptions = {
	name: string;
	kind: ParameterKind;
	type?: TypeDescriptor;
	default?: unknown;
	description?: string;
	/** Infer a missing type from the default value. Defaults to true. */
	inferType?: boolean;
	/** Index of the declared parameter this entry binds to */
	position?: number;
};

export type ParameterData = {
	name: string;
	kind: ParameterKind;
	type: TypeDescriptorData;
	default: string | null;
	description: string | null;
};

function renderDefault(value: unknown): string {
	if (value instanceof SourceExpression) return value.text;
	if (typeof value === "string") return JSON.stringify(value);
	if (typeof value === "bigint") return `${value}n`;
	if (value === undefined) return "undefined";
	if (typeof value === "object" && value !== null) {
		return JSON.stringify(value);
	}
	return String(value);
}

export class Parameter {
	readonly name: string;
	readonly kind: ParameterKind;
	readonly type: TypeDescriptor;
	readonly default: unknown;
	readonly description: string | undefined;
	readonly position: number;

	constructor(options: ParameterOptions) {
		this.name = options.name;
		this.kind = options.kind;
		this.default = "default" in options ? options.default : UNSET;
		this.description = options.description;
		this.position = options.position ?? 0;

		const declared = options.type ?? UNSET;
		this.type =
			options.inferType !== false && isUnset(declared)
				? this.inferredType()
				: declared;
	}

	/**
	 * Type derived from the default value. `UNSET` when there is no default or
	 * the default is `undefined`; a `null` default gives the `null` type.
	 */
	private inferredType(): TypeDescriptor {
		if (isUnset(this.default)) return UNSET;
		if (this.default instanceof SourceExpression) return this.default.type;
		return typeOfValue(this.default);
	}

	get isTyped(): boolean {
		return !isUnset(this.type);
	}

	get hasDefault(): boolean {
		return !isUnset(this.default);
	}

	get isRequired(): boolean {
		return !this.hasDefault;
	}

	get isOptional(): boolean {
		return !this.isRequired;
	}

	withDescription(description: string | undefined): Parameter {
		return new Parameter({
			name: this.name,
			kind: this.kind,
			type: this.type,
			default: this.default,
			description,
			inferType: false,
			position: this.position,
		});
	}

	render(): string {
		let text = this.kind === ParameterKind.VAR_POSITIONAL ? `...${this.name}` : this.name;
		if (this.isTyped) text += `: ${renderName(this.type)}`;
		if (this.hasDefault) text += ` = ${renderDefault(this.default)}`;
		return text;
	}

	toData(): ParameterData {
		return {
			name: this.name,
			kind: this.kind,
			type: typeToData(this.type),
			default: this.hasDefault ? renderDefault(this.default) : null,
			description: this.description ?? null,
		};
	}

	toString(): string {
		return `Parameter(name='${this.name}', kind=${this.kind}, type=${renderName(this.type)}, default=${this.hasDefault ? renderDefault(this.default) : UNSET}, description='${this.description ?? ""}')`;
	}
}
