/**
 * Raised when a price series breaks the ordering contract (ascending, unique
 * dates, positive finite closes). Data sufficiency is never an error; it is
 * reported per field in the indicator result.
 */
export class PreconditionError extends Error {
	readonly ticker: string;
	readonly index: number;

	constructor(ticker: string, index: number, message: string) {
		super(`${ticker}: observation ${index}: ${message}`);
		this.name = "PreconditionError";
		this.ticker = ticker;
		this.index = index;
	}
}
