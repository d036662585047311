export {
	DEFAULT_NAMESPACE,
	formatItemStack,
	formatResourceLocation,
	itemI18nKey,
	itemStack,
	parseItemStack,
	parseResourceLocation,
	resourceLocationFromFile,
	resourceLocationsEqual,
} from "./resource.ts";
export type { ItemKeyRoot, ItemStack, ResourceLocation } from "./types.ts";
