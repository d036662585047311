export {
	createItemRenderer,
	createTextureLookup,
	resolveTexture,
} from "./texture.ts";
export type {
	Icon,
	ItemRenderer,
	ItemRendererOptions,
	TextureIcon,
	TextureLookup,
} from "./types.ts";
