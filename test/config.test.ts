import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { loadProperties, parseProperties } from "../src/config/index.ts";

const fixture = (name: string): string =>
	fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe("parseProperties", () => {
	it("fills defaults", () => {
		expect(parseProperties({ modid: "mod" })).toEqual({
			modid: "mod",
			defaultLang: "en_us",
			isZeroBlack: false,
			textureBaseUrl: "",
			macros: {},
			minecraftVersion: "1.20.4",
		});
	});

	it("reports every invalid field", () => {
		expect(() => parseProperties({ modid: "Bad Mod", isZeroBlack: "yes" })).toThrow(
			/^Invalid properties: modid: must be a lowercase mod id; isZeroBlack: /,
		);
	});

	it("requires a mod id", () => {
		expect(() => parseProperties({})).toThrow(/^Invalid properties: modid: /);
	});
});

describe("loadProperties", () => {
	it("reads and validates a file", () => {
		const props = loadProperties(fixture("properties.json"));
		expect(props.modid).toBe("mod");
		expect(props.isZeroBlack).toBe(true);
		expect(props.macros).toEqual({ "$(item)": "$(#b0b)" });
		expect(props.defaultLang).toBe("en_us");
	});

	it("wraps read failures", () => {
		expect(() => loadProperties(fixture("missing.json"))).toThrow(
			/^Failed to read properties file .*missing\.json$/,
		);
	});
});
