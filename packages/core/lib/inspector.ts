import * as path from "node:path";
import { Node, Project, type SourceFile } from "ts-morph";
import {
	ClassMetadata,
	type ClassMetadataOptions,
} from "./class-metadata.ts";
import { defaultConfig } from "./config.ts";
import { NotFoundError, UnsupportedObjectError } from "./errors.ts";
import type { FilterConfig } from "./filter.ts";
import { type AnyFunction, FunctionMetadata, isClassValue } from "./function.ts";
import {
	type FunctionLikeNode,
	type SignatureOptions,
	extractSignatureParts,
	isFunctionLike,
} from "./signature.ts";
import type { Config, InspectedKind } from "./types.ts";

export type InspectResult = FunctionMetadata | ClassMetadata;

export type InspectOptions = {
	/** Overrides for the configured member filter */
	filter?: Partial<FilterConfig>;
};

export function inspectedKind(result: InspectResult): InspectedKind {
	return result instanceof ClassMetadata ? "class" : "function";
}

function isAnyFunction(value: unknown): value is AnyFunction {
	return typeof value === "function";
}

/**
 * Entry point: reads declarations from TypeScript sources and turns them into
 * {@link FunctionMetadata} or {@link ClassMetadata}, optionally bound to the
 * matching run-time value.
 */
export class Inspector {
	private project: Project;
	private config: Config;
	private directory: string;

	constructor(directory: string, config: Config = defaultConfig) {
		this.config = config;
		this.directory = directory;

		const tsConfigPath = path.join(directory, "tsconfig.json");

		try {
			this.project = new Project({
				tsConfigFilePath: tsConfigPath,
				skipAddingFilesFromTsConfig: true,
			});
		} catch (error) {
			// No usable tsconfig.json: fall back to default compiler options
			if (this.config.debug) {
				console.log(
					"[Sigscope] Failed to load tsconfig.json, using default compiler options:",
					error instanceof Error ? error.message : error,
				);
			}
			this.project = new Project({
				skipAddingFilesFromTsConfig: true,
				compilerOptions: {
					allowJs: true,
				},
			});
		}

		if (this.config.debug) {
			console.log("[Sigscope] Inspector initialized");
			console.log("[Sigscope] tsconfig.json:", tsConfigPath);
		}
	}

	/**
	 * Add source text under a virtual file name, replacing any earlier version.
	 */
	addSource(fileName: string, text: string): SourceFile {
		return this.project.createSourceFile(
			path.resolve(this.directory, fileName),
			text,
			{ overwrite: true },
		);
	}

	/**
	 * Inspect the class, function or function-valued `const` called `name` in a file.
	 * @param runtime The matching run-time value (class, instance or function), if any
	 * @throws NotFoundError when the file or the declaration does not exist
	 */
	inspect(
		filePath: string,
		name: string,
		runtime?: unknown,
		options: InspectOptions = {},
	): InspectResult {
		const startTime = Date.now();

		if (this.config.debug) {
			console.log(`[Sigscope] Inspecting ${name} in ${filePath}`);
		}

		const sourceFile = this.getSourceFile(filePath);
		const declaration =
			sourceFile.getClass(name) ??
			sourceFile.getFunction(name) ??
			sourceFile.getVariableDeclaration(name);
		if (!declaration) {
			throw new NotFoundError(name, filePath);
		}

		const result = this.inspectNode(declaration, runtime, options);

		if (this.config.debug) {
			console.log(
				`[Sigscope] Inspected ${inspectedKind(result)} ${result.name} in ${Date.now() - startTime}ms`,
			);
		}
		return result;
	}

	/**
	 * Dispatch a declaration node: a class gives {@link ClassMetadata}; a function,
	 * method, arrow function or a variable initialised with one gives
	 * {@link FunctionMetadata}.
	 * @throws UnsupportedObjectError for any other node
	 */
	inspectNode(
		node: Node,
		runtime?: unknown,
		options: InspectOptions = {},
	): InspectResult {
		if (Node.isClassDeclaration(node)) {
			return new ClassMetadata(node, runtime, this.classOptions(options));
		}

		const target = Node.isVariableDeclaration(node)
			? node.getInitializer()
			: node;
		if (target && isFunctionLike(target)) {
			return this.functionMetadata(target, runtime, node);
		}

		throw new UnsupportedObjectError(
			`Cannot inspect a ${node.getKindName()}; expected a class or a function`,
		);
	}

	/**
	 * Dispatch a run-time value using the declaration of the same name in `filePath`.
	 * Functions and classes are looked up by their own name, objects by their
	 * constructor's name (and come back as initialised {@link ClassMetadata}).
	 * @throws UnsupportedObjectError for primitives and anonymous values
	 */
	inspectValue(
		value: unknown,
		filePath: string,
		options: InspectOptions = {},
	): InspectResult {
		if (typeof value === "function") {
			if (!value.name) {
				throw new UnsupportedObjectError("Cannot inspect an anonymous function");
			}
			return this.inspect(filePath, value.name, value, options);
		}

		if (typeof value === "object" && value !== null) {
			const ctor = value.constructor;
			if (typeof ctor !== "function" || ctor === Object || !ctor.name) {
				throw new UnsupportedObjectError(
					"Cannot inspect an object that is not a class instance",
				);
			}
			return this.inspect(filePath, ctor.name, value, options);
		}

		throw new UnsupportedObjectError(
			`Cannot inspect a value of type ${value === null ? "null" : typeof value}`,
		);
	}

	private functionMetadata(
		node: FunctionLikeNode,
		runtime: unknown,
		declaration: Node,
	): FunctionMetadata {
		const parts = extractSignatureParts(node, this.signatureOptions());
		if (runtime === undefined) return new FunctionMetadata(parts);
		if (!isAnyFunction(runtime) || isClassValue(runtime)) {
			throw new UnsupportedObjectError(
				`Run-time value for ${declaration.getKindName()} is not a plain function`,
			);
		}
		return new FunctionMetadata(parts, runtime);
	}

	private signatureOptions(): SignatureOptions {
		return {
			skipThis: this.config.skipThis,
			inferTypes: this.config.inferTypes,
			includeJSDoc: this.config.includeJSDoc,
		};
	}

	private classOptions(options: InspectOptions): ClassMetadataOptions {
		return {
			...this.signatureOptions(),
			debug: this.config.debug,
			filter: { ...this.config.filter, ...options.filter },
		};
	}

	private getSourceFile(filePath: string): SourceFile {
		const absolutePath = path.resolve(this.directory, filePath);
		const sourceFile =
			this.project.getSourceFile(absolutePath) ??
			this.project.addSourceFileAtPathIfExists(absolutePath);
		if (!sourceFile) {
			throw new NotFoundError(filePath, this.directory);
		}
		return sourceFile;
	}
}
