import type { ItemStack } from "../resource/types.ts";

/** A single item in a crafting cell. Always a leaf. */
export type SimpleIngredient = {
	readonly kind: "simple";
	readonly item: ItemStack;
};

/**
 * Alternatives for a cell depending on whether another mod is loaded.
 * Nests only through `default` and `ifLoaded`.
 */
export type ConditionalIngredient = {
	readonly kind: "conditional";
	readonly default: readonly Ingredient[];
	readonly ifLoaded: readonly Ingredient[];
};

export type Ingredient = SimpleIngredient | ConditionalIngredient;

/** A crafting grid cell; `null` is an empty (air) slot. */
export type IngredientSlot = readonly Ingredient[] | null;

export type RecipeResult = {
	readonly item: ItemStack;
	readonly count: number;
};

/** A crafting recipe laid out as grid cells in row-major order. */
export type Recipe = {
	readonly ingredients: readonly IngredientSlot[];
	readonly result: RecipeResult;
};

/** Renders one item texture; `isFirst` marks the visible entry of a cycling group. */
export type RenderItem = (
	item: ItemStack,
	isFirst: boolean,
	count?: number,
) => string;

export type CraftingTableContext = {
	readonly renderItem: RenderItem;
	/** Resolves UI labels such as the show/hide summaries. */
	readonly localize: (key: string) => string;
	/** Display name of an item, used to label each grid. */
	readonly itemName: (item: ItemStack) => string;
};
