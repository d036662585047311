/**
 * Texture lookup and item/icon image rendering.
 */

import debug from "debug";
import { classNames, element, voidElement } from "../html/html.ts";
import { localizeItem, localizeTexture } from "../i18n/i18n.ts";
import {
	formatResourceLocation,
	parseResourceLocation,
} from "../resource/resource.ts";
import type { ItemStack, ResourceLocation } from "../resource/types.ts";
import type {
	Icon,
	ItemRenderer,
	ItemRendererOptions,
	TextureIcon,
	TextureLookup,
} from "./types.ts";

const log = debug("craftpage:texture");

const joinUrl = (baseUrl: string, path: string): string => {
	if (!baseUrl || /^[a-z][a-z0-9+.-]*:/i.test(path)) return path;
	return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
};

/**
 * Build a lookup from resource ids to URLs. Relative URLs are resolved
 * against `baseUrl`; ids without a namespace default to `minecraft`.
 */
export const createTextureLookup = (
	entries: Readonly<Record<string, string>>,
	baseUrl = "",
): TextureLookup =>
	new Map(
		Object.entries(entries).map(([id, url]) => [
			formatResourceLocation(parseResourceLocation(id)),
			joinUrl(baseUrl, url),
		]),
	);

/** Resolve a texture or item id to its URL. Throws for unknown ids. */
export const resolveTexture = (
	lookup: TextureLookup,
	id: string | ResourceLocation,
): string => {
	const key = formatResourceLocation(
		typeof id === "string" ? parseResourceLocation(id) : id,
	);
	const url = lookup.get(key);
	if (url === undefined) {
		log("missing texture %s", key);
		throw new Error(`No texture for ${key}`);
	}
	return url;
};

const isTextureIcon = (icon: Icon): icon is TextureIcon => "texture" in icon;

/**
 * Renderers for item textures and icons. Items are looked up by their own id;
 * alt and title text is the localized item name.
 */
export const createItemRenderer = (
	options: ItemRendererOptions,
): ItemRenderer => {
	const itemName = (item: ItemStack): string =>
		localizeItem(options.i18n, item).value;

	const image = (
		id: ResourceLocation,
		name: string,
		className?: string,
	): string =>
		voidElement("img", {
			class: className,
			src: resolveTexture(options.textures, id),
			alt: name,
			title: name,
			loading: "lazy",
		});

	const renderItem = (
		item: ItemStack,
		isFirst: boolean,
		count?: number,
	): string => {
		const shown = count ?? item.count ?? 1;
		return element(
			"div",
			{
				class: classNames(
					"texture",
					"item-texture",
					isFirst && "multi-texture-active",
				),
			},
			image(item, itemName(item)) +
				(shown > 1
					? element("span", { class: "item-count" }, String(shown))
					: ""),
		);
	};

	const renderIcon = (icon: Icon): string => {
		if (isTextureIcon(icon)) {
			const name = localizeTexture(options.i18n, icon.texture, {
				silent: true,
			}).value;
			return image(icon.texture, name, "texture icon");
		}
		return image(icon, itemName(icon), "texture icon");
	};

	return { renderItem, renderIcon, itemName };
};
