/**
 * Crafting recipe rendering.
 * Turns recipes and their ingredient trees into HTML fragments.
 */

import { element, escapeHtml } from "../html/html.ts";
import { renderDisclosure } from "../page/page.ts";
import { formatResourceLocation } from "../resource/resource.ts";
import type {
	CraftingTableContext,
	Ingredient,
	IngredientSlot,
	Recipe,
	RenderItem,
} from "./types.ts";

export const RECIPE_SHOW_KEY = "craftpage.recipe.show";
export const RECIPE_HIDE_KEY = "craftpage.recipe.hide";

// ── Ingredients ──

/**
 * Render a cell's ingredients in order.
 *
 * A conditional ingredient renders both its `default` and its `ifLoaded`
 * alternatives, in that order, regardless of what is loaded. Only the first
 * top-level ingredient is rendered as `isFirst`.
 */
export const renderIngredients = (
	ingredients: readonly Ingredient[],
	isRecursive: boolean,
	renderItem: RenderItem,
): string => {
	let str = "";
	ingredients.forEach((ingredient, index) => {
		switch (ingredient.kind) {
			case "conditional":
				str += renderIngredients(ingredient.default, true, renderItem);
				str += renderIngredients(ingredient.ifLoaded, true, renderItem);
				break;
			case "simple":
				str += renderItem(ingredient.item, index === 0 && !isRecursive);
				break;
			default:
				throw new Error(
					`Unknown ingredient: ${JSON.stringify(ingredient satisfies never)}`,
				);
		}
	});
	return str;
};

// ── Crafting table ──

const renderCell = (slot: IngredientSlot, renderItem: RenderItem): string =>
	slot === null
		? element("div", { class: "crafting-table-cell empty" }, "")
		: element(
				"div",
				{ class: "crafting-table-cell" },
				renderIngredients(slot, false, renderItem),
			);

const renderRecipe = (
	recipe: Recipe,
	context: CraftingTableContext,
): string => {
	const grid = recipe.ingredients
		.map((slot) => renderCell(slot, context.renderItem))
		.join("");
	const result = context.renderItem(
		recipe.result.item,
		true,
		recipe.result.count,
	);
	return element(
		"div",
		{
			class: "crafting-table",
			"aria-label": context.itemName(recipe.result.item),
		},
		element("div", { class: "crafting-table-grid" }, grid) +
			element("div", { class: "crafting-table-result" }, result),
	);
};

/** Render every recipe's grid inside one show/hide disclosure. */
export const renderCraftingTable = (
	recipes: readonly Recipe[],
	context: CraftingTableContext,
): string =>
	renderDisclosure(
		{
			className: "crafting-info",
			showLabel: context.localize(RECIPE_SHOW_KEY),
			hideLabel: context.localize(RECIPE_HIDE_KEY),
		},
		recipes.map((recipe) => renderRecipe(recipe, context)).join(""),
	);

// ── Result lists ──

const formatResultValue = (value: unknown, field: string): string => {
	if (typeof value === "string") return value;
	if (typeof value === "number" || typeof value === "boolean") {
		return String(value);
	}
	if (
		typeof value === "object" &&
		value !== null &&
		"namespace" in value &&
		"path" in value &&
		typeof value.namespace === "string" &&
		typeof value.path === "string"
	) {
		return formatResourceLocation({
			namespace: value.namespace,
			path: value.path,
		});
	}
	throw new Error(`Result field "${field}" has no text form`);
};

/**
 * List one field of each recipe's result as inline code, e.g.
 * `Crafted into <code>stick</code>, <code>bone</code>.`
 *
 * Throws if a result has no such field.
 */
export const renderGenericResultList = (
	recipes: readonly { readonly result: object }[],
	resultField: string,
	description: string,
	separator: string,
): string => {
	const values = recipes.map(({ result }) => {
		const descriptor = Object.getOwnPropertyDescriptor(result, resultField);
		if (!descriptor) {
			throw new Error(`Recipe result has no field "${resultField}"`);
		}
		const value: unknown = descriptor.value;
		return `<code>${escapeHtml(formatResultValue(value, resultField))}</code>`;
	});
	return `${escapeHtml(description)} ${values.join(escapeHtml(separator))}.`;
};
