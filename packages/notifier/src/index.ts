export {
	buildTelegramMessage,
	escapeTelegramHtml,
	NAME_LIMIT,
	shortName,
	TELEGRAM_HIGH_YIELD_PCT,
} from "./message";
export type { TelegramMessageOptions } from "./message";
export { TelegramNotifier, TELEGRAM_API_BASE } from "./telegramNotifier";
export type { SendResult, TelegramNotifierOptions } from "./telegramNotifier";
