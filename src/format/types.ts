/** Style annotations a styled-text node can carry. */
export type Style =
	| { readonly type: "root" }
	| { readonly type: "paragraph" }
	| { readonly type: "bold" }
	| { readonly type: "italic" }
	| { readonly type: "underline" }
	| { readonly type: "strikethrough" }
	| { readonly type: "obfuscated" }
	| { readonly type: "color"; readonly color: string }
	| { readonly type: "link"; readonly href: string; readonly external: boolean }
	| { readonly type: "tooltip"; readonly text: string };

export type StyleType = Style["type"];

/** Plain text; may contain line breaks. */
export type TextNode = {
	readonly kind: "text";
	readonly text: string;
};

export type StyledNode = {
	readonly kind: "styled";
	readonly style: Style;
	readonly children: readonly FormatNode[];
};

export type EmptyNode = {
	readonly kind: "empty";
};

/** A styled-text tree. */
export type FormatNode = TextNode | StyledNode | EmptyNode;

/** Given a style's settings, returns a function wrapping rendered content. */
export type StyleHandler<S extends Style = Style> = (
	style: S,
) => (content: string) => string;

/** One handler per style type. */
export type StyleHandlers = {
	readonly [K in StyleType]: StyleHandler<Extract<Style, { type: K }>>;
};

export type FormatOptions = {
	/** Text substitutions applied before parsing, e.g. `$(item)` → `$(#b0b)`. */
	readonly macros?: Readonly<Record<string, string>>;
	/** Treat `$(0)` as black instead of a reset. */
	readonly isZeroBlack?: boolean;
};
