export {
	classNames,
	element,
	escapeHtml,
	renderAttributes,
	voidElement,
} from "./html.ts";
export type { AttributeValue } from "./html.ts";
