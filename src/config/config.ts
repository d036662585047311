/**
 * Project properties: the per-book settings every renderer reads.
 */

import { readFileSync } from "node:fs";
import debug from "debug";
import { z } from "zod";

const log = debug("craftpage:config");

export const propertiesSchema = z.object({
	modid: z.string().regex(/^[0-9a-z_\-.]+$/, "must be a lowercase mod id"),
	defaultLang: z.string().min(1).default("en_us"),
	isZeroBlack: z.boolean().default(false),
	textureBaseUrl: z.string().default(""),
	macros: z.record(z.string()).default({}),
	minecraftVersion: z.string().min(1).default("1.20.4"),
});

export type Properties = z.infer<typeof propertiesSchema>;

/** Validate raw properties, listing every problem in the thrown error. */
export const parseProperties = (raw: unknown): Properties => {
	const result = propertiesSchema.safeParse(raw);
	if (!result.success) {
		const details = result.error.issues
			.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
			.join("; ");
		throw new Error(`Invalid properties: ${details}`);
	}
	return result.data;
};

/** Read and validate a JSON properties file. */
export const loadProperties = (path: string): Properties => {
	log("loading properties from %s", path);
	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(path, "utf8"));
	} catch (err) {
		throw new Error(`Failed to read properties file ${path}`, { cause: err });
	}
	return parseProperties(raw);
};
