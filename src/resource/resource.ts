/**
 * Resource locations and item stacks.
 * Parses the `namespace:path` and `namespace:path#count{nbt}` forms used by
 * book data and language keys.
 */

import { extname, relative, sep } from "node:path";
import type { ItemKeyRoot, ItemStack, ResourceLocation } from "./types.ts";

export const DEFAULT_NAMESPACE = "minecraft";

const RESOURCE_LOCATION_RE = /^(?:([0-9a-z_\-.]+):)?([0-9a-z_\-./]+)$/;
const ITEM_STACK_RE =
	/^(?:([0-9a-z_\-.]+):)?([0-9a-z_\-./]+)(?:#(\d+))?(\{.*\})?$/;

// ── Parsing ──

/** Parse `namespace:path`; a bare path takes `defaultNamespace`. */
export const parseResourceLocation = (
	value: string,
	defaultNamespace: string = DEFAULT_NAMESPACE,
): ResourceLocation => {
	const match = RESOURCE_LOCATION_RE.exec(value);
	if (!match) throw new Error(`Invalid resource location: ${value}`);
	return { namespace: match[1] ?? defaultNamespace, path: match[2] };
};

/** Parse `namespace:path#count{nbt}`; count and NBT are optional. */
export const parseItemStack = (
	value: string,
	defaultNamespace: string = DEFAULT_NAMESPACE,
): ItemStack => {
	const match = ITEM_STACK_RE.exec(value);
	if (!match) throw new Error(`Invalid item stack: ${value}`);
	return {
		namespace: match[1] ?? defaultNamespace,
		path: match[2],
		count: match[3] === undefined ? null : Number.parseInt(match[3], 10),
		nbt: match[4] ?? null,
	};
};

/** Build an item stack from a resource location. */
export const itemStack = (
	id: ResourceLocation,
	count: number | null = null,
): ItemStack => ({ namespace: id.namespace, path: id.path, count, nbt: null });

// ── Formatting ──

export const formatResourceLocation = (id: ResourceLocation): string =>
	`${id.namespace}:${id.path}`;

export const formatItemStack = (item: ItemStack): string => {
	let str = formatResourceLocation(item);
	if (item.count !== null) str += `#${item.count}`;
	if (item.nbt !== null) str += item.nbt;
	return str;
};

/** Translation key for an item, e.g. `item.minecraft.stick`. */
export const itemI18nKey = (
	item: ResourceLocation,
	root: ItemKeyRoot = "item",
): string => `${root}.${item.namespace}.${item.path.replaceAll("/", ".")}`;

export const resourceLocationsEqual = (
	a: ResourceLocation,
	b: ResourceLocation,
): boolean => a.namespace === b.namespace && a.path === b.path;

/**
 * Derive the id of a data file from its location under a base directory,
 * e.g. `categories/basics/tools.json` under `categories` is `modid:basics/tools`.
 */
export const resourceLocationFromFile = (
	namespace: string,
	baseDir: string,
	file: string,
): ResourceLocation => {
	const rel = relative(baseDir, file);
	if (rel.startsWith("..")) {
		throw new Error(`${file} is not inside ${baseDir}`);
	}
	const path = rel.slice(0, rel.length - extname(rel).length).split(sep);
	return parseResourceLocation(`${namespace}:${path.join("/")}`);
};
