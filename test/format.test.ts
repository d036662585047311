import { describe, expect, it } from "vitest";
import {
	applyMacros,
	createStyleRenderer,
	HTML_STYLE_HANDLERS,
	parseFormatTree,
	renderText,
} from "../src/format/index.ts";
import type { FormatNode, StyleHandlers } from "../src/format/index.ts";
import { createI18n } from "../src/i18n/index.ts";

const render = createStyleRenderer(HTML_STYLE_HANDLERS);
const text = (value: string): FormatNode => ({ kind: "text", text: value });

// ── Rendering ──

describe("renderStyledTree", () => {
	it("renders empty text as nothing", () => {
		expect(render(text(""))).toBe("");
	});

	it("joins lines with breaks and no trailing break", () => {
		expect(render(text("a\nb"))).toBe("a<br />b");
		expect(renderText("a\r\nb\rc")).toBe("a<br />b<br />c");
	});

	it("escapes text", () => {
		expect(render(text("1 < 2 & 3"))).toBe("1 &lt; 2 &amp; 3");
	});

	it("renders empty nodes as nothing", () => {
		expect(render({ kind: "empty" })).toBe("");
	});

	it("renders children in order inside their style", () => {
		const node: FormatNode = {
			kind: "styled",
			style: { type: "bold" },
			children: [
				text("hi"),
				{ kind: "empty" },
				{
					kind: "styled",
					style: { type: "color", color: "#ff0000" },
					children: [text("x")],
				},
			],
		};
		expect(render(node)).toBe(
			'<strong>hi<span style="color: #ff0000">x</span></strong>',
		);
	});

	it("dispatches to a custom table", () => {
		const markdown = createStyleRenderer({
			...HTML_STYLE_HANDLERS,
			bold: () => (content) => `**${content}**`,
			italic: () => (content) => `_${content}_`,
		});
		expect(
			markdown({
				kind: "styled",
				style: { type: "bold" },
				children: [
					{ kind: "styled", style: { type: "italic" }, children: [text("x")] },
				],
			}),
		).toBe("**_x_**");
	});

	it("rejects an incomplete style table at setup", () => {
		const partial: StyleHandlers = { ...HTML_STYLE_HANDLERS };
		Reflect.deleteProperty(partial, "tooltip");
		expect(() => createStyleRenderer(partial)).toThrow(
			"Missing style handlers: tooltip",
		);
	});

	it("rejects an unknown style instead of dropping it", () => {
		const node: FormatNode = JSON.parse(
			'{"kind":"styled","style":{"type":"sparkle"},"children":[{"kind":"text","text":"x"}]}',
		);
		expect(() => render(node)).toThrow('Unknown style type: {"type":"sparkle"}');
	});

	it("rejects an unknown node kind", () => {
		const node: FormatNode = JSON.parse('{"kind":"image"}');
		expect(() => render(node)).toThrow('Unknown format node: {"kind":"image"}');
	});
});

// ── Parsing ──

describe("parseFormatTree", () => {
	const html = (
		source: string,
		options: Parameters<typeof parseFormatTree>[1] = {},
	): string =>
		render(parseFormatTree(source, options));

	it("builds a paragraph-rooted tree", () => {
		expect(parseFormatTree("Hello")).toEqual({
			kind: "styled",
			style: { type: "root" },
			children: [
				{
					kind: "styled",
					style: { type: "paragraph" },
					children: [{ kind: "text", text: "Hello" }],
				},
			],
		});
	});

	it("renders empty text as nothing", () => {
		expect(html("")).toBe("");
	});

	it("breaks lines and paragraphs", () => {
		expect(html("a$(br)b")).toBe("<p>a<br />b</p>");
		expect(html("one$(br2)two")).toBe("<p>one</p><p>two</p>");
		expect(html("a$(br2)")).toBe("<p>a</p>");
	});

	it("opens formatting styles and resets them", () => {
		expect(html("$(l)bold$() plain")).toBe("<p><strong>bold</strong> plain</p>");
		expect(html("$(l)$(o)both$()")).toBe("<p><strong><em>both</em></strong></p>");
		expect(html("$(n)u$()$(m)s$()$(k)k")).toBe(
			'<p><u>u</u><s>s</s><span class="obfuscated">k</span></p>',
		);
	});

	it("applies colors", () => {
		expect(html("$(c)red")).toBe('<p><span style="color: #ff5555">red</span></p>');
		expect(html("$(#ABC)x")).toBe('<p><span style="color: #abc">x</span></p>');
	});

	it("treats $(0) as a reset unless zero is black", () => {
		expect(html("$(l)a$(0)b")).toBe("<p><strong>a</strong>b</p>");
		expect(html("$(0)b", { isZeroBlack: true })).toBe(
			'<p><span style="color: #000000">b</span></p>',
		);
	});

	it("substitutes macros", () => {
		expect(html("Use $(item)Ink$().", { macros: { "$(item)": "$(#b0b)" } })).toBe(
			'<p>Use <span style="color: #b0b">Ink</span>.</p>',
		);
	});

	it("expands macros that produce other macros", () => {
		expect(
			html("$(item)Ink", {
				macros: { "$(item)": "$(accent)", "$(accent)": "$(l)" },
			}),
		).toBe("<p><strong>Ink</strong></p>");
	});

	it("links to entries and external sites", () => {
		expect(html("See $(l:basics/intro)intro$(/l)!")).toBe(
			'<p>See <a href="#basics/intro">intro</a>!</p>',
		);
		expect(html("$(l:https://example.com)site$(/l)")).toBe(
			'<p><a href="https://example.com" target="_blank" rel="noopener noreferrer">site</a></p>',
		);
	});

	it("closes styles opened inside a link with the link", () => {
		expect(html("$(l:x)$(l)a$(/l)b")).toBe(
			'<p><a href="#x"><strong>a</strong></a>b</p>',
		);
	});

	it("ignores an unmatched close", () => {
		expect(html("a$(/l)b")).toBe("<p>ab</p>");
	});

	it("renders tooltips", () => {
		expect(html("$(t:Hint)word$(/t)")).toBe(
			'<p><span class="has-tooltip" title="Hint">word</span></p>',
		);
	});

	it("inserts key binding names", () => {
		const i18n = createI18n({ lookup: { "key.jump": "Jump" }, lang: "en_us" });
		expect(html("Press $(k:jump)", { i18n })).toBe("<p>Press Jump</p>");
		expect(html("Press $(k:jump)")).toBe("<p>Press jump</p>");
	});

	it("escapes text between codes", () => {
		expect(html("1 < 2")).toBe("<p>1 &lt; 2</p>");
	});

	it("rejects unknown codes", () => {
		expect(() => parseFormatTree("$(zz)")).toThrow(
			"Unknown formatting code: $(zz)",
		);
		expect(() => parseFormatTree("$(constructor)")).toThrow(
			"Unknown formatting code: $(constructor)",
		);
	});
});

describe("applyMacros", () => {
	it("replaces every occurrence", () => {
		expect(applyMacros("$(a) and $(a)", { "$(a)": "$(l)" })).toBe(
			"$(l) and $(l)",
		);
	});

	it("leaves text alone without macros", () => {
		expect(applyMacros("$(a)", {})).toBe("$(a)");
	});

	it("expands macro output until it settles", () => {
		expect(
			applyMacros("$(item)x", { "$(item)": "$(thing)", "$(thing)": "$(l)" }),
		).toBe("$(l)x");
	});

	it("matches the longest key at each position", () => {
		expect(applyMacros("$(ab)$(a)", { "$(a)": "1", "$(ab)": "2" })).toBe("21");
	});

	it("expands a shorter key found in a longer key's output", () => {
		expect(applyMacros("$(item)", { "$(item)": "$(i)tem", "$(i)": "$(o)" })).toBe(
			"$(o)tem",
		);
	});

	it("treats keys as literal text", () => {
		expect(applyMacros("a.b axb", { ".": "!" })).toBe("a!b axb");
	});

	it("keeps a macro that expands to itself", () => {
		expect(applyMacros("$(x)", { "$(x)": "$(x)" })).toBe("$(x)");
	});

	it("rejects macros that never settle", () => {
		expect(() =>
			applyMacros("$(a)", { "$(a)": "$(b)", "$(b)": "$(a)" }),
		).toThrow("Macro expansion did not settle: $(a)");
	});
});
