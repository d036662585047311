/**
 * Page furniture: disclosures, spoilers, permalinks and section headers.
 */

import { classNames, element, escapeHtml } from "../html/html.ts";
import type {
	DisclosureOptions,
	HeaderLevel,
	SectionHeaderContext,
	SectionHeaderValue,
	Spoilerable,
} from "./types.ts";

export const JUMP_TO_TOP_KEY = "craftpage.permalink.top";
export const PERMALINK_KEY = "craftpage.permalink.link";
export const TABLE_OF_CONTENTS_ID = "table-of-contents";

/**
 * A collapsible block. Labels are localized markup and are inserted as
 * written. The summary carries both labels; the stylesheet shows
 * one or the other depending on the open state.
 */
export const renderDisclosure = (
	options: DisclosureOptions,
	content: string,
): string =>
	element(
		"details",
		{ class: classNames("details-collapsible", options.className) },
		element(
			"summary",
			{},
			element(
				"span",
				{ class: "collapse-show" },
				options.showLabel,
			) +
				element(
					"span",
					{ class: "collapse-hide" },
					options.hideLabel,
				),
		) + content,
	);

/** Render content, obscured when the value is a spoiler. */
export const maybeSpoileredBlock = (
	value: Spoilerable,
	renderContent: () => string,
): string =>
	value.isSpoiler
		? element("div", { class: "spoilered" }, renderContent())
		: renderContent();

const iconLink = (href: string, title: string, icon: string): string =>
	element(
		"a",
		{ href, class: "permalink small", title },
		element("i", { class: `bi ${icon}` }, ""),
	);

export const jumpToTop = (title: string): string =>
	iconLink(`#${TABLE_OF_CONTENTS_ID}`, title, "bi-box-arrow-up");

export const permalink = (anchor: string, title: string): string =>
	iconLink(`#${anchor}`, title, "bi-link-45deg");

const isHeaderLevel = (level: number): level is HeaderLevel =>
	Number.isInteger(level) && level >= 1 && level <= 6;

/**
 * Heading for a category or entry: icon, name, a link back to the table of
 * contents and a permalink to the section, anchored on the id's path.
 */
export const renderSectionHeader = (
	value: SectionHeaderValue,
	headerLevel: number,
	className: string,
	context: SectionHeaderContext,
): string => {
	if (!isHeaderLevel(headerLevel)) {
		throw new Error(`Invalid header level: ${headerLevel}`);
	}
	const anchor = value.id.path;
	const name = typeof value.name === "string" ? value.name : value.name.value;
	return element(
		`h${headerLevel}`,
		{ class: `${className}-header page-header`, id: anchor },
		context.renderIcon(value.icon) +
			escapeHtml(name) +
			jumpToTop(context.localize(JUMP_TO_TOP_KEY)) +
			permalink(anchor, context.localize(PERMALINK_KEY)),
	);
};
