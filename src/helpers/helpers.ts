/**
 * Helpers exposed to page templates: element wrapping, localization and
 * texture URLs.
 */

import type { Properties } from "../config/config.ts";
import { parseFormatTree } from "../format/parse.ts";
import { createStyleRenderer } from "../format/render.ts";
import { HTML_STYLE_HANDLERS } from "../format/styles.ts";
import type { StyleHandlers } from "../format/types.ts";
import { escapeHtml } from "../html/html.ts";
import { localize } from "../i18n/i18n.ts";
import type { I18n } from "../i18n/types.ts";
import { resolveTexture } from "../texture/texture.ts";
import type { TextureLookup } from "../texture/types.ts";

/**
 * Wrap escaped text in an element. Attributes are passed through as written,
 * e.g. `wrap("x", "span", 'class="a"')` → `<span class="a">x</span>`.
 */
export const wrap = (
	value: string,
	tag: string,
	...attributes: string[]
): string => {
	const attrs = attributes.length > 0 ? ` ${attributes.join(" ")}` : "";
	return `<${tag}${attrs}>${escapeHtml(value)}</${tag}>`;
};

export type TemplateHelperOptions = {
	readonly properties: Pick<Properties, "isZeroBlack" | "macros">;
	readonly i18n: I18n;
	readonly textures: TextureLookup;
	readonly styles?: StyleHandlers;
};

export type LocalizeHelperOptions = {
	/** Parse formatting codes and render the result as styled HTML. */
	readonly format?: boolean;
	/** Escape the plain value. Localized strings are trusted markup otherwise. */
	readonly escape?: boolean;
	readonly silent?: boolean;
};

export type TemplateHelpers = {
	readonly wrap: typeof wrap;
	readonly localize: (key: string, options?: LocalizeHelperOptions) => string;
	readonly texture: (id: string) => string;
};

export const createTemplateHelpers = (
	options: TemplateHelperOptions,
): TemplateHelpers => {
	const renderStyledTree = createStyleRenderer(
		options.styles ?? HTML_STYLE_HANDLERS,
	);

	const localizeHelper = (
		key: string,
		helperOptions: LocalizeHelperOptions = {},
	): string => {
		const localized = localize(options.i18n, key, {
			silent: helperOptions.silent,
		});
		if (!helperOptions.format) {
			return helperOptions.escape
				? escapeHtml(localized.value)
				: localized.value;
		}
		return renderStyledTree(
			parseFormatTree(localized.value, {
				macros: options.properties.macros,
				isZeroBlack: options.properties.isZeroBlack,
				i18n: options.i18n,
			}),
		);
	};

	const texture = (id: string): string => {
		try {
			return resolveTexture(options.textures, id);
		} catch (err) {
			throw new Error(`Failed to resolve texture for id: ${id}`, {
				cause: err,
			});
		}
	};

	return { wrap, localize: localizeHelper, texture };
};
