import { describe, expect, it } from "vitest";
import { createI18n } from "../src/i18n/index.ts";
import {
	createItemRenderer,
	createTextureLookup,
	resolveTexture,
} from "../src/texture/index.ts";

const stick = { namespace: "minecraft", path: "stick", count: null, nbt: null };

describe("createTextureLookup", () => {
	it("normalizes ids and resolves relative URLs", () => {
		const lookup = createTextureLookup(
			{
				stick: "textures/stick.png",
				"mod:wand": "https://cdn.example.com/wand.png",
			},
			"https://book.example.com/v1/",
		);
		expect(lookup.get("minecraft:stick")).toBe(
			"https://book.example.com/v1/textures/stick.png",
		);
		expect(lookup.get("mod:wand")).toBe("https://cdn.example.com/wand.png");
	});

	it("keeps URLs as given without a base", () => {
		expect(createTextureLookup({ stick: "/t/stick.png" }).get("minecraft:stick")).toBe(
			"/t/stick.png",
		);
	});
});

describe("resolveTexture", () => {
	const lookup = createTextureLookup({ stick: "/t/stick.png" });

	it("resolves strings and resource locations", () => {
		expect(resolveTexture(lookup, "minecraft:stick")).toBe("/t/stick.png");
		expect(resolveTexture(lookup, stick)).toBe("/t/stick.png");
	});

	it("throws for unknown ids", () => {
		expect(() => resolveTexture(lookup, "apple")).toThrow(
			"No texture for minecraft:apple",
		);
	});
});

describe("createItemRenderer", () => {
	const { renderItem, renderIcon, itemName } = createItemRenderer({
		textures: createTextureLookup({
			stick: "/t/stick.png",
			"minecraft:textures/mob_effect/speed.png": "/t/speed.png",
		}),
		i18n: createI18n({
			lookup: {
				"item.minecraft.stick": "Stick",
				"effect.minecraft.speed": "Speed",
			},
			lang: "en_us",
		}),
	});

	it("marks the first item", () => {
		expect(renderItem(stick, true)).toBe(
			'<div class="texture item-texture multi-texture-active">' +
				'<img src="/t/stick.png" alt="Stick" title="Stick" loading="lazy" />' +
				"</div>",
		);
	});

	it("shows counts above one", () => {
		expect(renderItem(stick, false, 4)).toBe(
			'<div class="texture item-texture">' +
				'<img src="/t/stick.png" alt="Stick" title="Stick" loading="lazy" />' +
				'<span class="item-count">4</span>' +
				"</div>",
		);
		expect(renderItem(stick, false, 1)).not.toContain("item-count");
	});

	it("falls back to the stack's own count", () => {
		expect(renderItem({ ...stick, count: 16 }, false)).toContain(
			'<span class="item-count">16</span>',
		);
	});

	it("renders item and texture icons", () => {
		expect(renderIcon(stick)).toBe(
			'<img class="texture icon" src="/t/stick.png" alt="Stick" title="Stick" loading="lazy" />',
		);
		expect(
			renderIcon({
				texture: {
					namespace: "minecraft",
					path: "textures/mob_effect/speed.png",
				},
			}),
		).toBe(
			'<img class="texture icon" src="/t/speed.png" alt="Speed" title="Speed" loading="lazy" />',
		);
	});

	it("names items", () => {
		expect(itemName(stick)).toBe("Stick");
	});

	it("throws for items without textures", () => {
		expect(() =>
			renderItem({ ...stick, path: "apple" }, true),
		).toThrow("No texture for minecraft:apple");
	});
});
