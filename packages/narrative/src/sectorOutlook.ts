import type { SectorOutlook } from "./types";

/**
 * Pulls the JSON object out of a free-text reply: everything from the first
 * `{` to the last `}`. Only string values are kept; anything unparsable
 * yields an empty outlook.
 */
export const parseSectorOutlook = (text: string): SectorOutlook => {
	const start = text.indexOf("{");
	const end = text.lastIndexOf("}");
	if (start < 0 || end <= start) {
		return {};
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(text.slice(start, end + 1));
	} catch {
		return {};
	}
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		return {};
	}
	const outlook: SectorOutlook = {};
	for (const [sector, value] of Object.entries(parsed)) {
		if (typeof value === "string" && value.trim()) {
			outlook[sector] = value.trim();
		}
	}
	return outlook;
};
