/**
 * HTML string helpers shared by every renderer.
 * Markup is carried as plain strings; text is escaped where it enters.
 */

/** Escape text for use in element content or a quoted attribute value. */
export const escapeHtml = (unsafe: string): string =>
	unsafe
		.replaceAll("&", "&amp;")
		.replaceAll("<", "&lt;")
		.replaceAll(">", "&gt;")
		.replaceAll('"', "&quot;")
		.replaceAll("'", "&#039;");

export type AttributeValue = string | number | boolean | null | undefined;

/**
 * Render an attribute map as ` key="value"` pairs, in insertion order.
 * `true` renders a bare attribute; `false`, `null` and `undefined` are skipped.
 */
export const renderAttributes = (
	attributes: Readonly<Record<string, AttributeValue>>,
): string => {
	let str = "";
	for (const [name, value] of Object.entries(attributes)) {
		if (value === false || value === null || value === undefined) continue;
		str +=
			value === true ? ` ${name}` : ` ${name}="${escapeHtml(String(value))}"`;
	}
	return str;
};

/** Wrap already-rendered markup in an element. */
export const element = (
	tag: string,
	attributes: Readonly<Record<string, AttributeValue>>,
	content: string,
): string => `<${tag}${renderAttributes(attributes)}>${content}</${tag}>`;

/** A self-closing element such as `<img />`. */
export const voidElement = (
	tag: string,
	attributes: Readonly<Record<string, AttributeValue>>,
): string => `<${tag}${renderAttributes(attributes)} />`;

/** Join CSS class names, dropping empty entries. */
export const classNames = (
	...names: readonly (string | false | null | undefined)[]
): string => names.filter((name) => !!name).join(" ");
