export { findCraftingRecipes, toCraftingRecipe } from "./convert.ts";
export {
	RECIPE_HIDE_KEY,
	RECIPE_SHOW_KEY,
	renderCraftingTable,
	renderGenericResultList,
	renderIngredients,
} from "./recipe.ts";
export type {
	ConditionalIngredient,
	CraftingTableContext,
	Ingredient,
	IngredientSlot,
	Recipe,
	RecipeResult,
	RenderItem,
	SimpleIngredient,
} from "./types.ts";
