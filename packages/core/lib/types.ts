/**
 * Type definitions for the inspection library
 */

import type { FilterConfig } from "./filter.ts";

export type Config = {
	/** Log what the inspector does to the console */
	debug: boolean;
	/** Read descriptions from doc comments */
	includeJSDoc: boolean;
	/** Drop a leading `this:` parameter from signatures */
	skipThis: boolean;
	/** Infer a missing parameter type from its default value */
	inferTypes: boolean;
	/** Which class members are exposed */
	filter: FilterConfig;
};

export type InspectedKind = "function" | "class";
