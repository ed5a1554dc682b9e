import type { ClassDeclaration } from "ts-morph";
import {
	AlreadyInitializedError,
	NotInitializedError,
	UnsupportedObjectError,
} from "./errors.ts";
import { type FilterConfig, MemberFilter } from "./filter.ts";
import { isClassValue, isThenable } from "./function.ts";
import {
	type ParsedDocComment,
	defaultDocParser,
	docDescription,
	getDocComment,
} from "./jsdoc.ts";
import {
	type HierarchySnapshot,
	type MemberData,
	Method,
	createMethod,
	memberNames,
	snapshotHierarchy,
} from "./member.ts";
import type { Parameter } from "./parameter.ts";
import { type Selector, selectEntry } from "./select.ts";
import type { SignatureOptions } from "./signature.ts";

export type ClassMetadataOptions = SignatureOptions & {
	filter?: Partial<FilterConfig>;
	debug?: boolean;
};

export type ClassData = {
	name: string;
	methods: MemberData[];
	description: string;
	initialized: boolean;
	docstring: string | null;
};

type ArgsMap = Record<string, unknown>;

/**
 * Members of a class (or of one instance of it), classified and filtered, plus
 * the state needed to construct the class and call its members.
 *
 * The run-time value is optional. Without it the metadata is read-only and
 * `init`/`callMethod` fail with {@link UnsupportedObjectError}. An instance
 * passed in is referenced, not copied.
 *
 * `init` mutates this object; callers sharing one instance must not call it
 * concurrently.
 */
export class ClassMetadata {
	readonly declaration: ClassDeclaration;
	readonly className: string;
	readonly name: string;
	readonly hierarchy: HierarchySnapshot;
	readonly filter: MemberFilter;
	readonly receivedInstance: boolean;
	/** Constructor, whatever members the filter hides */
	readonly initMethod: Method | undefined;
	readonly docstring: string | undefined;
	readonly doc: ParsedDocComment;

	private readonly byName: ReadonlyMap<string, Method>;
	private readonly ordered: readonly Method[];
	private readonly ctor: Function | undefined;
	private readonly debug: boolean;
	private initialized: boolean;
	private _instance: object | undefined;

	constructor(
		declaration: ClassDeclaration,
		runtime?: unknown,
		options: ClassMetadataOptions = {},
	) {
		this.declaration = declaration;
		this.className = declaration.getName() ?? "default";
		this.debug = options.debug ?? false;

		if (runtime === undefined) {
			this.receivedInstance = false;
			this.ctor = undefined;
		} else if (typeof runtime === "function") {
			if (!isClassValue(runtime)) {
				throw new UnsupportedObjectError(
					`Run-time value for class ${this.className} is not a class`,
				);
			}
			this.receivedInstance = false;
			this.ctor = runtime;
		} else if (typeof runtime === "object" && runtime !== null) {
			this.receivedInstance = true;
			this._instance = runtime;
			this.ctor = runtime.constructor;
		} else {
			throw new UnsupportedObjectError(
				`Cannot bind a value of type ${runtime === null ? "null" : typeof runtime} to class ${this.className}`,
			);
		}

		this.initialized = this.receivedInstance;
		this.name = this.receivedInstance
			? `${this.className} instance`
			: this.className;

		this.hierarchy = snapshotHierarchy(declaration);
		this.filter = new MemberFilter(options.filter);

		const all: Method[] = [];
		for (const memberName of memberNames(this.hierarchy)) {
			const method = createMethod(memberName, this.hierarchy, options);
			if (method) all.push(method);
		}
		this.initMethod = all.find((method) => method.isConstructor);
		this.ordered = Object.freeze(this.filter.extract(all));
		this.byName = new Map(this.ordered.map((method) => [method.name, method]));

		const jsDoc =
			options.includeJSDoc === false ? undefined : getDocComment(declaration);
		this.docstring = jsDoc?.getText();
		this.doc = (options.docParser ?? defaultDocParser).parse(jsDoc);

		if (this.debug) {
			console.log(
				`[Sigscope] ${this.name}: ${this.ordered.length}/${all.length} members after filtering (hierarchy: ${this.hierarchy.map((level) => level.name).join(" -> ")})`,
			);
		}
	}

	/** Filtered members by name, in the same order as {@link methods} */
	get members(): ReadonlyMap<string, Method> {
		return this.byName;
	}

	get methods(): readonly Method[] {
		return this.ordered;
	}

	get isInitialized(): boolean {
		return this.initialized;
	}

	get instance(): object | undefined {
		return this._instance;
	}

	get hasInit(): boolean {
		return this.initMethod !== undefined;
	}

	get initArgs(): readonly Parameter[] | undefined {
		return this.initMethod?.params;
	}

	get description(): string {
		return docDescription(this.doc);
	}

	get hasDocstring(): boolean {
		return this.docstring !== undefined && this.docstring.length > 0;
	}

	/**
	 * Retrieve a member by name or by index into the filtered member list.
	 * @throws NotFoundError, IndexOutOfRangeError, InvalidKeyTypeError
	 */
	getMethod(key: Selector): Method {
		return selectEntry(key, this.byName, this.ordered, `class ${this.name}`);
	}

	/**
	 * Construct the bound class and keep the instance.
	 * @throws AlreadyInitializedError when an instance already exists
	 * @throws UnsupportedObjectError when there is no constructible class
	 */
	init(...args: unknown[]): void {
		if (this.initialized) {
			throw new AlreadyInitializedError(this.name);
		}
		if (!this.ctor) {
			throw new UnsupportedObjectError(
				`Class ${this.name} has no run-time value to construct`,
			);
		}
		if (this.declaration.isAbstract()) {
			throw new UnsupportedObjectError(`Class ${this.name} is abstract`);
		}

		const instance: unknown = Reflect.construct(this.ctor, args);
		if (typeof instance !== "object" || instance === null) {
			throw new UnsupportedObjectError(
				`Constructing ${this.name} did not produce an object`,
			);
		}
		this._instance = instance;
		this.initialized = true;

		if (this.debug) {
			console.log(`[Sigscope] Initialized ${this.name} with ${args.length} argument(s)`);
		}
	}

	/** {@link init} with arguments given by constructor parameter name */
	initWithArgs(values: Readonly<ArgsMap>): void {
		this.init(...(this.initMethod?.toCallArguments(values) ?? []));
	}

	/**
	 * Call a member. Static and class methods run against the class; everything
	 * else needs an instance, either the one this metadata was built from or the
	 * one created by {@link init}. A property member returns its current value.
	 */
	callMethod(key: Selector, ...args: unknown[]): unknown {
		const method = this.getMethod(key);

		if (!method.isClassLevel && !this.initialized) {
			throw new NotInitializedError(this.name);
		}
		if (method.isConstructor) {
			throw new UnsupportedObjectError(
				`Use init() to construct ${this.name}; the constructor cannot be called as a method`,
			);
		}

		const receiver = method.isClassLevel ? this.ctor : this._instance;
		if (!receiver) {
			throw new UnsupportedObjectError(
				`Class ${this.name} has no run-time value to call ${method.name} on`,
			);
		}

		const attribute: unknown = Reflect.get(receiver, method.name);
		if (method.isProperty) return attribute;
		if (typeof attribute !== "function") {
			throw new UnsupportedObjectError(
				`${this.name}.${method.name} is not reachable at run time`,
			);
		}

		if (this.debug) {
			console.log(`[Sigscope] Calling ${this.name}.${method.name}`);
		}
		return Reflect.apply(attribute, receiver, args);
	}

	/** Like {@link callMethod}, awaiting the result only when it is thenable */
	async callMethodAsync(key: Selector, ...args: unknown[]): Promise<unknown> {
		const result = this.callMethod(key, ...args);
		return isThenable(result) ? await result : result;
	}

	/** {@link callMethod} with arguments given by parameter name */
	callMethodWithArgs(key: Selector, values: Readonly<ArgsMap>): unknown {
		const method = this.getMethod(key);
		return this.callMethod(key, ...method.toCallArguments(values));
	}

	/**
	 * Split one combined argument map into constructor arguments and the rest,
	 * for a single call that constructs the class and then calls `method`.
	 * Static targets and classes without a constructor take no constructor
	 * arguments.
	 */
	splitInitArgs(
		args: Readonly<ArgsMap>,
		method?: Selector | Method,
	): [ArgsMap, ArgsMap] {
		const target =
			method === undefined || method instanceof Method
				? method
				: this.getMethod(method);

		if (!this.initMethod || target?.isClassLevel) {
			return [{}, { ...args }];
		}

		const initNames = new Set(this.initMethod.params.map((p) => p.name));
		const initArgs: ArgsMap = {};
		const methodArgs: ArgsMap = {};
		for (const [key, value] of Object.entries(args)) {
			if (initNames.has(key)) initArgs[key] = value;
			else methodArgs[key] = value;
		}
		return [initArgs, methodArgs];
	}

	render(indent = 2): string {
		let text = `class ${this.name}:`;
		if (this.description) text += `\n${this.description}`;
		if (this.ordered.length === 0) return text;
		const pad = " ".repeat(indent);
		return `${text}\n${this.ordered.map((method) => pad + method.render()).join("\n")}`;
	}

	toData(): ClassData {
		return {
			name: this.name,
			methods: this.ordered.map((method) => method.toData()),
			description: this.description,
			initialized: this.initialized,
			docstring: this.docstring ?? null,
		};
	}

	toString(): string {
		return `ClassMetadata(name='${this.name}', methods=${this.ordered.length}, hasInit=${this.hasInit}, description='${this.description}')`;
	}
}
