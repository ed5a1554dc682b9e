import {
	IndexOutOfRangeError,
	InvalidKeyTypeError,
	NotFoundError,
} from "./errors.ts";

export type Selector = string | number;

/**
 * Look an entry up by name or by position in declaration order.
 * Negative indices count from the end.
 */
export function selectEntry<T>(
	key: unknown,
	byName: ReadonlyMap<string, T>,
	ordered: readonly T[],
	scope: string,
): T {
	if (typeof key === "string") {
		const entry = byName.get(key);
		if (entry === undefined) throw new NotFoundError(key, scope);
		return entry;
	}

	if (typeof key === "number" && Number.isInteger(key)) {
		const index = key < 0 ? ordered.length + key : key;
		if (index < 0 || index >= ordered.length) {
			throw new IndexOutOfRangeError(key, ordered.length);
		}
		return ordered[index];
	}

	throw new InvalidKeyTypeError(key);
}
