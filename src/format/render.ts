/**
 * Styled-text tree rendering through a style dispatch table.
 */

import { escapeHtml } from "../html/html.ts";
import { STYLE_TYPES } from "./styles.ts";
import type { FormatNode, Style, StyleHandlers } from "./types.ts";

const LINE_BREAK_RE = /\r\n|\r|\n/;

/** Escape text and turn its line breaks into `<br />`. */
export const renderText = (text: string): string =>
	text.split(LINE_BREAK_RE).map(escapeHtml).join("<br />");

/**
 * Bind a style table, checking that every style type has a handler.
 * Throws on an incomplete table, and at render time on a node whose style
 * type is unknown.
 */
export const createStyleRenderer = (
	handlers: StyleHandlers,
): ((node: FormatNode) => string) => {
	const missing = STYLE_TYPES.filter(
		(type) => typeof handlers[type] !== "function",
	);
	if (missing.length > 0) {
		throw new Error(`Missing style handlers: ${missing.join(", ")}`);
	}

	const applyStyle = (style: Style, content: string): string => {
		switch (style.type) {
			case "root":
				return handlers.root(style)(content);
			case "paragraph":
				return handlers.paragraph(style)(content);
			case "bold":
				return handlers.bold(style)(content);
			case "italic":
				return handlers.italic(style)(content);
			case "underline":
				return handlers.underline(style)(content);
			case "strikethrough":
				return handlers.strikethrough(style)(content);
			case "obfuscated":
				return handlers.obfuscated(style)(content);
			case "color":
				return handlers.color(style)(content);
			case "link":
				return handlers.link(style)(content);
			case "tooltip":
				return handlers.tooltip(style)(content);
			default:
				throw new Error(
					`Unknown style type: ${JSON.stringify(style satisfies never)}`,
				);
		}
	};

	const renderStyledTree = (node: FormatNode): string => {
		switch (node.kind) {
			case "text":
				return renderText(node.text);
			case "empty":
				return "";
			case "styled":
				return applyStyle(
					node.style,
					node.children.map(renderStyledTree).join(""),
				);
			default:
				throw new Error(
					`Unknown format node: ${JSON.stringify(node satisfies never)}`,
				);
		}
	};

	return renderStyledTree;
};
