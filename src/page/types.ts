import type { LocalizedStr } from "../i18n/types.ts";
import type { ResourceLocation } from "../resource/types.ts";
import type { Icon } from "../texture/types.ts";

/** Anything that may be hidden behind a spoiler. */
export type Spoilerable = {
	readonly isSpoiler: boolean;
};

/** A category or entry as seen by its section header. */
export type SectionHeaderValue = {
	readonly icon: Icon;
	readonly name: string | LocalizedStr;
	readonly id: ResourceLocation;
};

export type HeaderLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type SectionHeaderContext = {
	readonly renderIcon: (icon: Icon) => string;
	readonly localize: (key: string) => string;
};

export type DisclosureOptions = {
	readonly className?: string;
	readonly showLabel: string;
	readonly hideLabel: string;
};
