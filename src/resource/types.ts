/** A namespaced identifier such as `minecraft:stick`. */
export type ResourceLocation = {
	readonly namespace: string;
	readonly path: string;
};

/** An item reference with an optional stack size and raw NBT suffix. */
export type ItemStack = ResourceLocation & {
	readonly count: number | null;
	readonly nbt: string | null;
};

/** Translation key roots an item may be registered under. */
export type ItemKeyRoot = "item" | "block";
