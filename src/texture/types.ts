import type { I18n } from "../i18n/types.ts";
import type { ItemStack, ResourceLocation } from "../resource/types.ts";

/** Resource id (as `namespace:path`) → servable URL. */
export type TextureLookup = ReadonlyMap<string, string>;

/** An icon backed directly by a texture rather than an item. */
export type TextureIcon = {
	readonly texture: ResourceLocation;
};

export type Icon = ItemStack | TextureIcon;

export type ItemRendererOptions = {
	readonly textures: TextureLookup;
	readonly i18n: I18n;
};

export type ItemRenderer = {
	readonly renderItem: (
		item: ItemStack,
		isFirst: boolean,
		count?: number,
	) => string;
	readonly renderIcon: (icon: Icon) => string;
	readonly itemName: (item: ItemStack) => string;
};
