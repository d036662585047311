/**
 * Language file loading.
 * Reads `<lang>.json`, `<lang>.flatten.json` and their `.json5` forms from
 * `lang` directories and layers them, later sources overriding earlier ones.
 */

import { existsSync, readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import debug from "debug";
import JSON5 from "json5";
import type { Registry } from "../registry/types.ts";
import { createI18n } from "./i18n.ts";
import type { I18n } from "./types.ts";

const log = debug("craftpage:i18n");

/** A directory of language files. External sources supply strings only. */
export type LangSource = {
	readonly dir: string;
	readonly external?: boolean;
};

export type LoadAllI18nOptions = {
	readonly sources: readonly LangSource[];
	readonly defaultLang: string;
	/** Strings layered beneath every source, e.g. the vanilla language table. */
	readonly base?: Readonly<Record<string, string>>;
};

export type LoadI18nOptions = LoadAllI18nOptions & {
	readonly lang: string;
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Flatten nested language JSON into dotted keys.
 * An empty-string key names its parent: `{ a: { "": "x", b: "y" } }` gives
 * `a` and `a.b`.
 */
export const flattenLangJson = (
	data: unknown,
	prefix = "",
): Record<string, string> => {
	if (!isPlainObject(data)) {
		throw new Error(`Expected a language object at ${prefix || "<root>"}`);
	}
	const out: Record<string, string> = {};
	for (const [key, value] of Object.entries(data)) {
		const full = key === "" ? prefix : prefix ? `${prefix}.${key}` : key;
		if (typeof value === "string") {
			out[full] = value;
		} else if (isPlainObject(value)) {
			Object.assign(out, flattenLangJson(value, full));
		} else {
			throw new Error(`Expected a string or object at ${full}`);
		}
	}
	return out;
};

const unescapePercent = (
	lookup: Readonly<Record<string, string>>,
): Record<string, string> =>
	Object.fromEntries(
		Object.entries(lookup).map(([key, value]) => [
			key,
			value.replaceAll("%%", "%"),
		]),
	);

// JSON5 is a superset of JSON, so one parser reads every form.
const readLangFile = (file: string): Record<string, string> => {
	let data: unknown;
	try {
		data = JSON5.parse(readFileSync(file, "utf8"));
	} catch (err) {
		throw new Error(`Failed to read language file ${file}`, { cause: err });
	}
	return flattenLangJson(data);
};

const LANG_FILE = /^(.+?)(?:\.flatten)?\.json5?$/;

const langFileNames = (lang: string): readonly string[] => [
	`${lang}.json`,
	`${lang}.json5`,
	`${lang}.flatten.json`,
	`${lang}.flatten.json5`,
];

/** Load one language from a directory, or `null` if it has no files for it. */
export const loadLangDirectory = (
	dir: string,
	lang: string,
): Record<string, string> | null => {
	let lookup: Record<string, string> | null = null;
	for (const name of langFileNames(lang)) {
		const file = join(dir, name);
		if (!existsSync(file)) continue;
		log("loading %s", file);
		lookup = { ...(lookup ?? {}), ...readLangFile(file) };
	}
	return lookup === null ? null : unescapePercent(lookup);
};

/** Languages with files in at least one internal source, sorted. */
export const listLanguages = (sources: readonly LangSource[]): string[] => {
	const langs = new Set<string>();
	for (const source of sources) {
		if (source.external || !existsSync(source.dir)) continue;
		for (const name of readdirSync(source.dir)) {
			const match = LANG_FILE.exec(name);
			if (match?.[1]) langs.add(match[1]);
		}
	}
	return [...langs].sort();
};

const collectLookup = (
	sources: readonly LangSource[],
	lang: string,
	base: Readonly<Record<string, string>> = {},
): { lookup: Record<string, string>; isInternal: boolean } => {
	let lookup: Record<string, string> = { ...base };
	let isInternal = false;
	for (const source of sources) {
		const loaded = loadLangDirectory(source.dir, lang);
		if (loaded === null) continue;
		lookup = { ...lookup, ...loaded };
		if (!source.external) isInternal = true;
	}
	return { lookup, isInternal };
};

const loadLanguage = (
	options: LoadAllI18nOptions,
	lang: string,
	defaultI18n: I18n | null,
): I18n => {
	const { lookup, isInternal } = collectLookup(
		options.sources,
		lang,
		options.base,
	);
	if (!isInternal) {
		throw new Error(`No internal language files for ${lang}`);
	}
	return createI18n({ lookup, lang, defaultI18n });
};

/**
 * Load a language across all sources. Languages other than `defaultLang`
 * fall back to it.
 */
export const loadI18n = (options: LoadI18nOptions): I18n => {
	const defaultI18n =
		options.lang === options.defaultLang
			? null
			: loadLanguage(options, options.defaultLang, null);
	return loadLanguage(options, options.lang, defaultI18n);
};

/**
 * Load every language the internal sources provide, keyed by language with
 * the default first. All of them share one default-language instance.
 */
export const loadAllI18n = (
	options: LoadAllI18nOptions,
): ReadonlyMap<string, I18n> => {
	const defaultI18n = loadLanguage(options, options.defaultLang, null);
	const all = new Map<string, I18n>([[options.defaultLang, defaultI18n]]);
	for (const lang of listLanguages(options.sources)) {
		if (lang === options.defaultLang) continue;
		all.set(lang, loadLanguage(options, lang, defaultI18n));
	}
	return all;
};

/**
 * The registry's language table, with item display names filling in items the
 * table has no `item.` or `block.` entry for.
 */
export const vanillaLookup = (registry: Registry): Record<string, string> => {
	const lookup: Record<string, string> = {};
	for (const item of registry.itemsByName.values()) {
		const key = `item.minecraft.${item.name}`;
		if (Object.hasOwn(registry.language, `block.minecraft.${item.name}`)) {
			continue;
		}
		lookup[key] = item.displayName;
	}
	return { ...lookup, ...registry.language };
};

/** An instance over the registry's bundled (English) language table. */
export const createVanillaI18n = (registry: Registry): I18n =>
	createI18n({ lookup: vanillaLookup(registry), lang: "en_us" });
