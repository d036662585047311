import MinecraftData from "minecraft-data";
import { z } from "zod";
import type { ItemDefinition, RawRecipe, Registry } from "./types.ts";

const rawRecipeItemSchema = z.union([
	z.number(),
	z.null(),
	z.object({
		id: z.number(),
		metadata: z.number().optional(),
		count: z.number().optional(),
	}),
]);

const rawRecipeSchema = z.object({
	result: z.object({
		id: z.number(),
		metadata: z.number().optional(),
		count: z.number().optional(),
	}),
	inShape: z.array(z.array(rawRecipeItemSchema)).optional(),
	ingredients: z.array(rawRecipeItemSchema).optional(),
});

/**
 * Create a registry for a specific Minecraft version.
 * Loads item, language and recipe data from minecraft-data.
 *
 * @param version - Minecraft version string (e.g. "1.20.4", "1.16.5")
 */
export const createRegistry = (version: string): Registry => {
	const mcData = MinecraftData(version);
	if (!mcData) {
		throw new Error(`Unsupported Minecraft version: ${version}`);
	}

	const itemsById = new Map<number, ItemDefinition>();
	const itemsByName = new Map<string, ItemDefinition>();

	for (const item of mcData.itemsArray.map(toItemDefinition)) {
		itemsById.set(item.id, item);
		itemsByName.set(item.name, item);
	}

	// Recipes are validated lazily, one result item at a time.
	const recipeCache = new Map<number, readonly RawRecipe[]>();
	const recipesFor = (itemId: number): readonly RawRecipe[] => {
		const cached = recipeCache.get(itemId);
		if (cached) return cached;
		const parsed = z
			.array(rawRecipeSchema)
			.parse(mcData.recipes[itemId] ?? []);
		recipeCache.set(itemId, parsed);
		return parsed;
	};

	return {
		itemsById,
		itemsByName,
		language: mcData.language ?? {},
		recipesFor,
	};
};

const toItemDefinition = (item: MinecraftData.Item): ItemDefinition => ({
	id: item.id,
	name: item.name,
	displayName: item.displayName,
});
