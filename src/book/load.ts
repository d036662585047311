/**
 * Build a book renderer from project properties: the Minecraft version picks
 * the vanilla registry, the default language drives language loading and the
 * texture base URL resolves relative texture paths.
 */

import debug from "debug";
import type { Properties } from "../config/config.ts";
import type { StyleHandlers } from "../format/types.ts";
import { loadI18n, vanillaLookup } from "../i18n/load.ts";
import type { LangSource } from "../i18n/load.ts";
import type { I18n } from "../i18n/types.ts";
import { createRegistry } from "../registry/registry.ts";
import type { Registry } from "../registry/types.ts";
import { createTextureLookup } from "../texture/texture.ts";
import { createBookRenderer } from "./book.ts";
import type { BookRenderer } from "./book.ts";

const log = debug("craftpage:book");

export type LoadBookOptions = {
	readonly properties: Properties;
	readonly langSources: readonly LangSource[];
	/** Defaults to the properties' default language. */
	readonly lang?: string;
	/** Texture or item id to URL, relative URLs resolved against the base URL. */
	readonly textures: Readonly<Record<string, string>>;
	readonly styles?: StyleHandlers;
};

export type LoadedBook = BookRenderer & {
	readonly registry: Registry;
	readonly i18n: I18n;
};

export const loadBook = (options: LoadBookOptions): LoadedBook => {
	const { properties } = options;
	const lang = options.lang ?? properties.defaultLang;
	log(
		"loading book %s (%s, Minecraft %s)",
		properties.modid,
		lang,
		properties.minecraftVersion,
	);

	const registry = createRegistry(properties.minecraftVersion);
	const i18n = loadI18n({
		sources: options.langSources,
		lang,
		defaultLang: properties.defaultLang,
		base: vanillaLookup(registry),
	});
	const textures = createTextureLookup(
		options.textures,
		properties.textureBaseUrl,
	);

	return {
		...createBookRenderer({
			properties,
			i18n,
			textures,
			styles: options.styles,
		}),
		registry,
		i18n,
	};
};
