export {
	JUMP_TO_TOP_KEY,
	jumpToTop,
	maybeSpoileredBlock,
	PERMALINK_KEY,
	permalink,
	renderDisclosure,
	renderSectionHeader,
	TABLE_OF_CONTENTS_ID,
} from "./page.ts";
export type {
	DisclosureOptions,
	HeaderLevel,
	SectionHeaderContext,
	SectionHeaderValue,
	Spoilerable,
} from "./types.ts";
