export { createTemplateHelpers, wrap } from "./helpers.ts";
export type {
	LocalizeHelperOptions,
	TemplateHelperOptions,
	TemplateHelpers,
} from "./helpers.ts";
