import type { SectorCategory } from "./reportSchema";

const SECTOR_KEYWORDS: ReadonlyArray<[SectorCategory, readonly string[]]> = [
	["Data Centre", ["data centre", "data center", "datacentre"]],
	["Healthcare", ["healthcare", "health care", "hospital", "nursing", "medical"]],
	["Hospitality", ["hospitality", "hotel", "serviced residence", "lodging"]],
	["Industrial", ["industrial", "logistics", "warehouse", "business park", "manufacturing"]],
	["Retail", ["retail", "mall", "shopping", "suburban"]],
	["Office", ["office", "grade a"]],
];

/**
 * Maps a free-text segment ("Industrial & Logistics", "Retail (Suburban)") to
 * a reporting sector. Segments naming several asset classes, or none that
 * is known, are Diversified.
 */
export const getSectorCategory = (segment: string): SectorCategory => {
	const text = segment.toLowerCase();
	if (text.includes("diversified") || text.includes("mixed")) {
		return "Diversified";
	}
	const matches = SECTOR_KEYWORDS.filter(([, keywords]) =>
		keywords.some((keyword) => text.includes(keyword))
	).map(([sector]) => sector);
	return matches.length === 1 ? matches[0] : "Diversified";
};
