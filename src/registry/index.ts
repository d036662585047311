export { createRegistry } from "./registry.ts";
export type {
	ItemDefinition,
	RawRecipe,
	RawRecipeItem,
	Registry,
} from "./types.ts";
