/**
 * A book renderer: the tree renderers bound to one book's properties,
 * language and textures.
 */

import type { Properties } from "../config/config.ts";
import { createStyleRenderer } from "../format/render.ts";
import { HTML_STYLE_HANDLERS } from "../format/styles.ts";
import type { FormatNode, StyleHandlers } from "../format/types.ts";
import { createTemplateHelpers } from "../helpers/helpers.ts";
import type { TemplateHelpers } from "../helpers/helpers.ts";
import { localize } from "../i18n/i18n.ts";
import type { I18n } from "../i18n/types.ts";
import { maybeSpoileredBlock, renderSectionHeader } from "../page/page.ts";
import type { SectionHeaderValue } from "../page/types.ts";
import {
	renderCraftingTable,
	renderGenericResultList,
	renderIngredients,
} from "../recipe/recipe.ts";
import type { Ingredient, Recipe } from "../recipe/types.ts";
import { createItemRenderer } from "../texture/texture.ts";
import type { ItemRenderer, TextureLookup } from "../texture/types.ts";

export type BookRendererOptions = {
	readonly properties: Pick<Properties, "isZeroBlack" | "macros">;
	readonly i18n: I18n;
	readonly textures: TextureLookup;
	readonly styles?: StyleHandlers;
};

export type BookRenderer = {
	readonly helpers: TemplateHelpers;
	readonly items: ItemRenderer;
	readonly renderIngredients: (ingredients: readonly Ingredient[]) => string;
	readonly renderCraftingTable: (recipes: readonly Recipe[]) => string;
	readonly renderGenericResultList: typeof renderGenericResultList;
	readonly renderStyledTree: (node: FormatNode) => string;
	readonly maybeSpoileredBlock: typeof maybeSpoileredBlock;
	readonly renderSectionHeader: (
		value: SectionHeaderValue,
		headerLevel: number,
		className: string,
	) => string;
};

/** Bind every renderer to a book. Throws if the style table is incomplete. */
export const createBookRenderer = (
	options: BookRendererOptions,
): BookRenderer => {
	const items = createItemRenderer({
		textures: options.textures,
		i18n: options.i18n,
	});
	const renderStyledTree = createStyleRenderer(
		options.styles ?? HTML_STYLE_HANDLERS,
	);
	const helpers = createTemplateHelpers(options);
	const label = (key: string): string => localize(options.i18n, key).value;

	return {
		helpers,
		items,
		renderIngredients: (ingredients) =>
			renderIngredients(ingredients, false, items.renderItem),
		renderCraftingTable: (recipes) =>
			renderCraftingTable(recipes, {
				renderItem: items.renderItem,
				itemName: items.itemName,
				localize: label,
			}),
		renderGenericResultList,
		renderStyledTree,
		maybeSpoileredBlock,
		renderSectionHeader: (value, headerLevel, className) =>
			renderSectionHeader(value, headerLevel, className, {
				renderIcon: items.renderIcon,
				localize: label,
			}),
	};
};
