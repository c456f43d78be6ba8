export interface ProviderErrorDetails {
	provider: string;
	ticker?: string;
	status?: number;
	cause?: unknown;
}

export class ProviderError extends Error {
	readonly provider: string;
	readonly ticker?: string;
	readonly status?: number;

	constructor(message: string, details: ProviderErrorDetails) {
		super(message, details.cause === undefined ? undefined : { cause: details.cause });
		this.name = "ProviderError";
		this.provider = details.provider;
		this.ticker = details.ticker;
		this.status = details.status;
	}
}
