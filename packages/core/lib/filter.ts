import type { Method } from "./member.ts";

/**
 * Which members a {@link ClassMetadata} exposes. Every flag that is turned off
 * excludes one group; a member is kept only if no exclusion matches it.
 */
export type FilterConfig = {
	/** The constructor */
	init: boolean;
	public: boolean;
	inherited: boolean;
	static: boolean;
	protected: boolean;
	private: boolean;
	classmethod: boolean;
};

export const defaultFilter: FilterConfig = {
	init: true,
	public: true,
	inherited: true,
	static: true,
	protected: false,
	private: false,
	classmethod: false,
};

type Exclusion = (method: Method) => boolean;

export class MemberFilter {
	readonly config: FilterConfig;
	private readonly exclusions: Exclusion[] = [];

	constructor(config: Partial<FilterConfig> = {}) {
		this.config = { ...defaultFilter, ...config };
		const c = this.config;

		if (!c.init) this.exclusions.push((m) => m.isConstructor);
		if (!c.static) this.exclusions.push((m) => m.isStatic);
		if (!c.inherited) this.exclusions.push((m) => m.isInherited);
		if (!c.private) this.exclusions.push((m) => m.isPrivate);
		if (!c.protected) this.exclusions.push((m) => m.isProtected);
		// the constructor answers to `init` only
		if (!c.public) this.exclusions.push((m) => m.isPublic && !m.isConstructor);
		if (!c.classmethod) this.exclusions.push((m) => m.isClassMethod);
	}

	check(method: Method): boolean {
		return !this.exclusions.some((excluded) => excluded(method));
	}

	extract(methods: readonly Method[]): Method[] {
		return methods.filter((method) => this.check(method));
	}
}
