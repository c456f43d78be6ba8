import type { FundamentalsRow } from "../types";

const STOP_WORDS = new Set([
	"the",
	"reit",
	"reits",
	"trust",
	"real",
	"estate",
	"investment",
	"ltd",
	"limited",
]);

export const normalizeReitName = (name: string): string =>
	name
		.toLowerCase()
		.replace(/&/g, " and ")
		.replace(/[^a-z0-9 ]+/g, " ")
		.split(/\s+/)
		.filter((token) => token.length > 0 && !STOP_WORDS.has(token))
		.join(" ");

const tokensOf = (key: string): Set<string> => new Set(key.split(" "));

const isSubset = (inner: Set<string>, outer: Set<string>): boolean => {
	for (const token of inner) {
		if (!outer.has(token)) {
			return false;
		}
	}
	return true;
};

// A single shared word is usually the sponsor's brand, which several REITs carry.
const MIN_SHARED_WORDS = 2;

const tokenMatch = (left: Set<string>, right: Set<string>): boolean =>
	Math.min(left.size, right.size) >= MIN_SHARED_WORDS &&
	(isSubset(left, right) || isSubset(right, left));

/**
 * Finds the scraped row for a configured REIT name. An exact match on the
 * normalised name wins. Otherwise a row matches when one side's words (at
 * least two of them) are a subset of the other's, and only if that row is the
 * single such candidate and no other name in `knownNames` would also claim it.
 */
export const matchFundamentals = (
	name: string,
	rows: readonly FundamentalsRow[],
	knownNames: readonly string[] = []
): FundamentalsRow | null => {
	const target = normalizeReitName(name);
	if (!target) {
		return null;
	}
	const normalized = rows
		.map((row) => ({ row, key: normalizeReitName(row.name) }))
		.filter((entry) => entry.key.length > 0);
	const exact = normalized.find((entry) => entry.key === target);
	if (exact) {
		return exact.row;
	}
	const targetTokens = tokensOf(target);
	const candidates = normalized.filter((entry) =>
		tokenMatch(tokensOf(entry.key), targetTokens)
	);
	if (candidates.length !== 1) {
		return null;
	}
	const [candidate] = candidates;
	const candidateTokens = tokensOf(candidate.key);
	const rivals = knownNames
		.map(normalizeReitName)
		.filter((key) => key.length > 0 && key !== target)
		.filter((key) => tokenMatch(tokensOf(key), candidateTokens));
	return rivals.length ? null : candidate.row;
};
