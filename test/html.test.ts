import { describe, expect, it } from "vitest";
import {
	classNames,
	element,
	escapeHtml,
	renderAttributes,
	voidElement,
} from "../src/html/index.ts";

describe("escapeHtml", () => {
	it("escapes markup and quotes", () => {
		expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
			"&lt;a href=&quot;x&quot;&gt;&#039;&amp;&#039;&lt;/a&gt;",
		);
	});

	it("leaves plain text alone", () => {
		expect(escapeHtml("plain text")).toBe("plain text");
	});
});

describe("renderAttributes", () => {
	it("renders in order, skipping false and absent values", () => {
		expect(
			renderAttributes({
				a: "1",
				b: true,
				c: false,
				d: null,
				e: undefined,
				f: 2,
			}),
		).toBe(' a="1" b f="2"');
	});

	it("escapes values", () => {
		expect(renderAttributes({ title: 'say "hi"' })).toBe(
			' title="say &quot;hi&quot;"',
		);
	});
});

describe("element", () => {
	it("wraps content without escaping it", () => {
		expect(element("p", { class: "x" }, "<b>hi</b>")).toBe(
			'<p class="x"><b>hi</b></p>',
		);
	});

	it("renders void elements", () => {
		expect(voidElement("img", { src: "a.png" })).toBe('<img src="a.png" />');
	});
});

describe("classNames", () => {
	it("drops empty entries", () => {
		expect(classNames("a", false, "", null, "b")).toBe("a b");
	});
});
