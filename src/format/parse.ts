/**
 * Parser for `$(...)` formatting codes in book text.
 *
 * `$(br)` breaks a line, `$(br2)` starts a paragraph, `$()` clears all open
 * styles. Bold/italic/underline/strikethrough/obfuscated are `$(l)` `$(o)`
 * `$(n)` `$(m)` `$(k)`; colors are `$(0)` to `$(f)` or `$(#rrggbb)`. Links and
 * tooltips open with `$(l:target)` / `$(t:text)` and close with `$(/l)` /
 * `$(/t)`. `$(k:key)` inserts the name of a key binding.
 */

import debug from "debug";
import { localizeKey } from "../i18n/i18n.ts";
import type { I18n } from "../i18n/types.ts";
import { COLOR_CODES } from "./styles.ts";
import type { FormatNode, FormatOptions, Style, StyledNode } from "./types.ts";

const log = debug("craftpage:format");

const CODE_RE = /\$\(([^)]*)\)/g;
const HEX_COLOR_RE = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i;
const EXTERNAL_LINK_RE = /^https?:\/\//;

type Frame = {
	readonly style: Style;
	readonly children: FormatNode[];
};

const SIMPLE_STYLES: ReadonlyMap<string, Style> = new Map<string, Style>([
	["l", { type: "bold" }],
	["o", { type: "italic" }],
	["n", { type: "underline" }],
	["m", { type: "strikethrough" }],
	["k", { type: "obfuscated" }],
]);

const MAX_MACRO_PASSES = 10;

const escapeRegExp = (text: string): string =>
	text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Substitute macros until the text stops changing, so a macro may expand to
 * another macro. Each pass scans the text once and matches the longest key at
 * each position, so `$(item)` wins over `$(i)` and a pass never rescans its
 * own output. Throws when expansion has not settled after ten passes.
 */
export const applyMacros = (
	text: string,
	macros: Readonly<Record<string, string>>,
): string => {
	const keys = Object.keys(macros)
		.filter((key) => key !== "")
		.sort((a, b) => b.length - a.length);
	if (keys.length === 0) return text;

	const pattern = new RegExp(keys.map(escapeRegExp).join("|"), "g");
	let current = text;
	for (let pass = 0; pass < MAX_MACRO_PASSES; pass++) {
		const next = current.replace(pattern, (key) => macros[key] ?? key);
		if (next === current) return current;
		current = next;
	}
	throw new Error(`Macro expansion did not settle: ${text}`);
};

const linkStyle = (target: string): Style =>
	EXTERNAL_LINK_RE.test(target)
		? { type: "link", href: target, external: true }
		: { type: "link", href: `#${target}`, external: false };

/** Parse book text into a tree of paragraphs. */
export const parseFormatTree = (
	text: string,
	options: FormatOptions & { readonly i18n?: I18n } = {},
): StyledNode => {
	const source = applyMacros(text, options.macros ?? {});
	const paragraphs: FormatNode[] = [];
	let stack: Frame[] = [{ style: { type: "paragraph" }, children: [] }];

	const top = (): Frame => stack[stack.length - 1];

	const closeTop = (): void => {
		const frame = stack.pop();
		if (!frame) return;
		const node: StyledNode = {
			kind: "styled",
			style: frame.style,
			children: frame.children,
		};
		if (stack.length === 0) {
			if (frame.children.length > 0) paragraphs.push(node);
		} else {
			top().children.push(node);
		}
	};

	const reset = (): void => {
		while (stack.length > 1) closeTop();
	};

	const open = (style: Style): void => {
		stack.push({ style, children: [] });
	};

	const close = (type: Style["type"], code: string): void => {
		let index = stack.length - 1;
		while (index > 0 && stack[index].style.type !== type) index--;
		if (index === 0) {
			log("ignoring unmatched $(%s)", code);
			return;
		}
		while (stack.length > index) closeTop();
	};

	const pushText = (value: string): void => {
		if (value !== "") top().children.push({ kind: "text", text: value });
	};

	const applyCode = (code: string): void => {
		if (code === "") return reset();
		if (code === "br") return pushText("\n");
		if (code === "br2") {
			reset();
			closeTop();
			stack = [{ style: { type: "paragraph" }, children: [] }];
			return;
		}
		const simple = SIMPLE_STYLES.get(code);
		if (simple) return open(simple);
		if (code === "/l") return close("link", code);
		if (code === "/t") return close("tooltip", code);
		if (code.startsWith("l:")) return open(linkStyle(code.slice(2)));
		if (code.startsWith("t:")) {
			return open({ type: "tooltip", text: code.slice(2) });
		}
		if (code.startsWith("k:")) {
			const key = code.slice(2);
			return pushText(
				options.i18n ? localizeKey(options.i18n, key).value : key,
			);
		}
		if (code === "0" && !options.isZeroBlack) return reset();
		if (Object.hasOwn(COLOR_CODES, code)) {
			return open({ type: "color", color: COLOR_CODES[code] });
		}
		if (HEX_COLOR_RE.test(code)) {
			return open({ type: "color", color: code.toLowerCase() });
		}
		throw new Error(`Unknown formatting code: $(${code})`);
	};

	let last = 0;
	for (const match of source.matchAll(CODE_RE)) {
		const index = match.index ?? 0;
		pushText(source.slice(last, index));
		applyCode(match[1]);
		last = index + match[0].length;
	}
	pushText(source.slice(last));

	reset();
	closeTop();

	return { kind: "styled", style: { type: "root" }, children: paragraphs };
};
