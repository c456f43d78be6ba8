import {
	createHttpClient,
	createLogger,
	errorMessage,
	httpStatusOf,
	type HttpClient,
	type ModuleLogger,
} from "@sreit/core";

export const TELEGRAM_API_BASE = "https://api.telegram.org";
const SEND_TIMEOUT_MS = 10_000;

export interface TelegramNotifierOptions {
	botToken: string;
	chatId: string;
	http?: HttpClient;
	apiBase?: string;
	logger?: ModuleLogger;
}

export interface SendResult {
	ok: boolean;
	error?: string;
}

/**
 * Telegram puts the reason for a rejected call in `response.data.description`.
 */
const telegramDescription = (error: unknown): string | undefined => {
	if (typeof error !== "object" || error === null || !("response" in error)) {
		return undefined;
	}
	const { response } = error;
	if (typeof response !== "object" || response === null || !("data" in response)) {
		return undefined;
	}
	const { data } = response;
	if (typeof data !== "object" || data === null || !("description" in data)) {
		return undefined;
	}
	return typeof data.description === "string" ? data.description : undefined;
};

export class TelegramNotifier {
	private readonly http: HttpClient;
	private readonly logger: ModuleLogger;

	constructor(private readonly options: TelegramNotifierOptions) {
		this.http = options.http ?? createHttpClient({ timeoutMs: SEND_TIMEOUT_MS });
		this.logger = options.logger ?? createLogger("notifier:telegram");
	}

	/**
	 * Delivery failures are reported in the result, never thrown.
	 */
	async send(text: string): Promise<SendResult> {
		const url = `${this.options.apiBase ?? TELEGRAM_API_BASE}/bot${this.options.botToken}/sendMessage`;
		try {
			await this.http.post(
				url,
				{
					chat_id: this.options.chatId,
					text,
					parse_mode: "HTML",
					disable_web_page_preview: true,
				},
				{ timeout: SEND_TIMEOUT_MS }
			);
			this.logger.info("telegram_sent", { chars: text.length });
			return { ok: true };
		} catch (error) {
			const reason = telegramDescription(error) ?? errorMessage(error);
			this.logger.warn("telegram_send_failed", {
				status: httpStatusOf(error),
				error: reason,
			});
			return { ok: false, error: reason };
		}
	}
}
