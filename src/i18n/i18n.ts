/**
 * Localization tables and the key conventions built on them.
 */

import debug from "debug";
import { itemI18nKey, parseItemStack } from "../resource/resource.ts";
import type { ItemStack, ResourceLocation } from "../resource/types.ts";
import type { I18n, LocalizedStr, LocalizeOptions } from "./types.ts";

const log = debug("craftpage:i18n");
const trace = debug("craftpage:i18n:trace");

// ── Construction ──

export const createI18n = (options: {
	lookup: Readonly<Record<string, string>> | null;
	lang: string;
	defaultI18n?: I18n | null;
}): I18n => ({
	lookup:
		options.lookup === null ? null : new Map(Object.entries(options.lookup)),
	lang: options.lang,
	defaultI18n: options.defaultI18n ?? null,
});

/** An instance that returns every key unchanged. */
export const createDisabledI18n = (lang = "en_us"): I18n =>
	createI18n({ lookup: null, lang });

export const isDefaultI18n = (i18n: I18n): boolean => i18n.defaultI18n === null;

const skipI18n = (key: string): LocalizedStr => ({ key, value: key });

// ── Lookup ──

/**
 * Look up the first of `keys` that has a translation.
 *
 * Later keys are fallbacks for the first. On a miss the explicit default wins,
 * then the fallback language, then the first key itself.
 */
export const localize = (
	i18n: I18n,
	keys: string | readonly string[],
	options: LocalizeOptions = {},
): LocalizedStr => {
	const all = typeof keys === "string" ? [keys] : keys;
	if (all.length === 0) throw new Error("localize requires at least one key");

	if (i18n.lookup === null) return skipI18n(all[0]);

	for (const key of all) {
		const value = i18n.lookup.get(key);
		if (value !== undefined) return { key, value };
	}

	(options.silent ? trace : log)(
		"No translation in %s for %s",
		i18n.lang,
		all.length === 1 ? `key ${all[0]}` : `keys ${all.join(", ")}`,
	);

	if (options.default !== undefined) return skipI18n(options.default);
	if (i18n.defaultI18n) return localize(i18n.defaultI18n, all, options);
	return skipI18n(all[0]);
};

/** Localize an item id, trying its `item.` key before its `block.` key. */
export const localizeItem = (
	i18n: I18n,
	item: string | ResourceLocation | ItemStack,
	options: LocalizeOptions = {},
): LocalizedStr => {
	const id = typeof item === "string" ? parseItemStack(item) : item;
	return localize(i18n, [itemI18nKey(id, "item"), itemI18nKey(id, "block")], {
		silent: options.silent,
	});
};

/** Localize a key binding name; the `key.` prefix is added when missing. */
export const localizeKey = (
	i18n: I18n,
	key: string,
	options: LocalizeOptions = {},
): LocalizedStr =>
	localize(i18n, key.startsWith("key.") ? key : `key.${key}`, {
		silent: options.silent,
	});

const titleCase = (value: string): string =>
	value
		.toLowerCase()
		.replace(/(^|[^a-z])([a-z])/g, (_, before: string, letter: string) =>
			`${before}${letter.toUpperCase()}`,
		);

/**
 * A readable name for a tag with no translation.
 *
 * - `forge:ores` → `Ores`
 * - `c:saplings/almond` → `Almond Saplings`
 * - `c:tea_ingredients/gloopy/weak` → `Tea Ingredients, Gloopy, Weak`
 */
export const fallbackTagName = (tag: ResourceLocation): string => {
	const parts = tag.path.split("/");
	if (parts.length === 2) return titleCase(`${parts[1]} ${parts[0]}`);
	return titleCase(tag.path.replaceAll("_", " ").replaceAll("/", ", "));
};

export const localizeItemTag = (
	i18n: I18n,
	tag: ResourceLocation,
	options: LocalizeOptions = {},
): LocalizedStr => {
	const localized = localize(
		i18n,
		[
			`tag.${tag.namespace}.${tag.path}`,
			`tag.item.${tag.namespace}.${tag.path}`,
			`tag.block.${tag.namespace}.${tag.path}`,
		],
		{ default: fallbackTagName(tag), silent: options.silent },
	);
	return { key: localized.key, value: `Tag: ${localized.value}` };
};

/**
 * Localize a texture by the registry entry it belongs to, e.g.
 * `minecraft:textures/mob_effect/speed.png` → `effect.minecraft.speed`.
 */
export const localizeTexture = (
	i18n: I18n,
	textureId: ResourceLocation,
	options: LocalizeOptions = {},
): LocalizedStr => {
	let path = textureId.path;
	if (path.startsWith("textures/")) path = path.slice("textures/".length);
	if (path.endsWith(".png")) path = path.slice(0, -".png".length);

	const slash = path.indexOf("/");
	if (slash === -1) {
		throw new Error(`Texture path has no registry folder: ${textureId.path}`);
	}
	let root = path.slice(0, slash);
	const rest = path.slice(slash + 1);
	if (root === "mob_effect") root = "effect";

	return localize(i18n, `${root}.${textureId.namespace}.${rest}`, {
		silent: options.silent,
	});
};

/** The language's display name, e.g. `English (United States)`. */
export const localizeLang = (
	i18n: I18n,
	options: LocalizeOptions = {},
): string => {
	const name = localize(i18n, "language.name", { silent: options.silent });
	const region = localize(i18n, "language.region", { silent: options.silent });
	return `${name.value} (${region.value})`;
};
