/** A string paired with the key it was looked up under. */
export type LocalizedStr = {
	readonly key: string;
	readonly value: string;
};

/**
 * A language table. A `null` lookup disables localization: every key
 * resolves to itself.
 */
export type I18n = {
	readonly lookup: ReadonlyMap<string, string> | null;
	readonly lang: string;
	readonly defaultI18n: I18n | null;
};

export type LocalizeOptions = {
	/** Returned (as both key and value) when no key has a translation. */
	readonly default?: string;
	/** Log misses at trace level; use for keys that are expected to be absent. */
	readonly silent?: boolean;
};
