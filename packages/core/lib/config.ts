import { z } from "zod";
import { defaultFilter } from "./filter.ts";
import type { Config } from "./types.ts";

export const defaultConfig: Config = {
	debug: false,
	includeJSDoc: true,
	skipThis: true,
	inferTypes: true,

	filter: { ...defaultFilter },
};

const filterSchema = z
	.object({
		init: z.boolean().default(defaultFilter.init),
		public: z.boolean().default(defaultFilter.public),
		inherited: z.boolean().default(defaultFilter.inherited),
		static: z.boolean().default(defaultFilter.static),
		protected: z.boolean().default(defaultFilter.protected),
		private: z.boolean().default(defaultFilter.private),
		classmethod: z.boolean().default(defaultFilter.classmethod),
	})
	.strict();

export const configSchema = z
	.object({
		debug: z.boolean().default(defaultConfig.debug),
		includeJSDoc: z.boolean().default(defaultConfig.includeJSDoc),
		skipThis: z.boolean().default(defaultConfig.skipThis),
		inferTypes: z.boolean().default(defaultConfig.inferTypes),
		filter: filterSchema.default({}),
	})
	.strict();

export type ConfigInput = z.input<typeof configSchema>;

/**
 * Validate a (possibly partial) configuration and fill in defaults.
 * Throws a `ZodError` listing every invalid field.
 */
export function resolveConfig(input: unknown = {}): Config {
	return configSchema.parse(input);
}
