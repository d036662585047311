/**
 * Conversion from minecraft-data crafting recipes to the grid model.
 */

import type { RawRecipe, RawRecipeItem, Registry } from "../registry/types.ts";
import type { ItemStack } from "../resource/types.ts";
import type { IngredientSlot, Recipe } from "./types.ts";

const GRID_SIZE = 3;
const GRID_CELLS = GRID_SIZE * GRID_SIZE;

const toItemStack = (registry: Registry, id: number): ItemStack => {
	const item = registry.itemsById.get(id);
	if (!item) throw new Error(`Unknown item id in recipe: ${id}`);
	return { namespace: "minecraft", path: item.name, count: null, nbt: null };
};

const toSlot = (registry: Registry, raw: RawRecipeItem): IngredientSlot => {
	if (raw === null) return null;
	const id = typeof raw === "number" ? raw : raw.id;
	if (id === -1) return null;
	return [{ kind: "simple", item: toItemStack(registry, id) }];
};

/**
 * Lay a raw recipe out on a 3x3 grid.
 * Shaped recipes keep their row/column positions; shapeless ingredients fill
 * the grid in order.
 */
export const toCraftingRecipe = (
	registry: Registry,
	raw: RawRecipe,
): Recipe => {
	const ingredients: IngredientSlot[] = [];

	if (raw.inShape) {
		if (
			raw.inShape.length > GRID_SIZE ||
			raw.inShape.some((row) => row.length > GRID_SIZE)
		) {
			throw new Error("Recipe shape does not fit a 3x3 grid");
		}
		for (let row = 0; row < GRID_SIZE; row++) {
			for (let col = 0; col < GRID_SIZE; col++) {
				ingredients.push(toSlot(registry, raw.inShape[row]?.[col] ?? null));
			}
		}
	} else if (raw.ingredients) {
		if (raw.ingredients.length > GRID_CELLS) {
			throw new Error("Shapeless recipe has more than 9 ingredients");
		}
		for (const item of raw.ingredients) ingredients.push(toSlot(registry, item));
		while (ingredients.length < GRID_CELLS) ingredients.push(null);
	} else {
		throw new Error("Recipe has neither a shape nor ingredients");
	}

	return {
		ingredients,
		result: {
			item: toItemStack(registry, raw.result.id),
			count: raw.result.count ?? 1,
		},
	};
};

/** All crafting recipes for an item, by name. */
export const findCraftingRecipes = (
	registry: Registry,
	itemName: string,
): readonly Recipe[] => {
	const item = registry.itemsByName.get(itemName);
	if (!item) throw new Error(`Unknown item: ${itemName}`);
	return registry
		.recipesFor(item.id)
		.map((raw) => toCraftingRecipe(registry, raw));
};
