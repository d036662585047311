export { applyMacros, parseFormatTree } from "./parse.ts";
export { createStyleRenderer, renderText } from "./render.ts";
export { COLOR_CODES, HTML_STYLE_HANDLERS, STYLE_TYPES } from "./styles.ts";
export type {
	EmptyNode,
	FormatNode,
	FormatOptions,
	Style,
	StyledNode,
	StyleHandler,
	StyleHandlers,
	StyleType,
	TextNode,
} from "./types.ts";
