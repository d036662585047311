/** Item definition from the Minecraft data registry. */
export type ItemDefinition = {
	readonly id: number;
	readonly name: string;
	readonly displayName: string;
};

/** A recipe element as stored by minecraft-data: an id, an object, or empty. */
export type RawRecipeItem =
	| number
	| null
	| {
			readonly id: number;
			readonly metadata?: number;
			readonly count?: number;
	  };

/** A crafting recipe as stored by minecraft-data. */
export type RawRecipe = {
	readonly result: {
		readonly id: number;
		readonly metadata?: number;
		readonly count?: number;
	};
	readonly inShape?: readonly (readonly RawRecipeItem[])[];
	readonly ingredients?: readonly RawRecipeItem[];
};

/** The loaded Minecraft data registry for a specific version. */
export type Registry = {
	readonly itemsById: ReadonlyMap<number, ItemDefinition>;
	readonly itemsByName: ReadonlyMap<string, ItemDefinition>;
	readonly language: Readonly<Record<string, string>>;
	/** Raw crafting recipes producing the given item id. */
	readonly recipesFor: (itemId: number) => readonly RawRecipe[];
};
