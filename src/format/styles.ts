import { element } from "../html/html.ts";
import type { StyleHandlers, StyleType } from "./types.ts";

/** Every style type, in declaration order. */
export const STYLE_TYPES: readonly StyleType[] = [
	"root",
	"paragraph",
	"bold",
	"italic",
	"underline",
	"strikethrough",
	"obfuscated",
	"color",
	"link",
	"tooltip",
];

/** Hex colors of the sixteen `$(0)` to `$(f)` format codes. */
export const COLOR_CODES: Readonly<Record<string, string>> = {
	"0": "#000000",
	"1": "#0000aa",
	"2": "#00aa00",
	"3": "#00aaaa",
	"4": "#aa0000",
	"5": "#aa00aa",
	"6": "#ffaa00",
	"7": "#aaaaaa",
	"8": "#555555",
	"9": "#5555ff",
	a: "#55ff55",
	b: "#55ffff",
	c: "#ff5555",
	d: "#ff55ff",
	e: "#ffff55",
	f: "#ffffff",
};

export const HTML_STYLE_HANDLERS: StyleHandlers = {
	root: () => (content) => content,
	paragraph: () => (content) => element("p", {}, content),
	bold: () => (content) => element("strong", {}, content),
	italic: () => (content) => element("em", {}, content),
	underline: () => (content) => element("u", {}, content),
	strikethrough: () => (content) => element("s", {}, content),
	obfuscated: () => (content) =>
		element("span", { class: "obfuscated" }, content),
	color: (style) => (content) =>
		element("span", { style: `color: ${style.color}` }, content),
	link: (style) => (content) =>
		element(
			"a",
			{
				href: style.href,
				target: style.external ? "_blank" : null,
				rel: style.external ? "noopener noreferrer" : null,
			},
			content,
		),
	tooltip: (style) => (content) =>
		element("span", { class: "has-tooltip", title: style.text }, content),
};
