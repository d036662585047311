export {
	createDisabledI18n,
	createI18n,
	fallbackTagName,
	isDefaultI18n,
	localize,
	localizeItem,
	localizeItemTag,
	localizeKey,
	localizeLang,
	localizeTexture,
} from "./i18n.ts";
export {
	createVanillaI18n,
	flattenLangJson,
	listLanguages,
	loadAllI18n,
	loadI18n,
	loadLangDirectory,
	vanillaLookup,
} from "./load.ts";
export type {
	LangSource,
	LoadAllI18nOptions,
	LoadI18nOptions,
} from "./load.ts";
export type { I18n, LocalizedStr, LocalizeOptions } from "./types.ts";
