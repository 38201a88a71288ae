/** Identifier parsing for chat-account references */

const NUMERIC_ID = /^\d{1,20}$/;
const MENTION = /^<@!?(\d{1,20})>$/;
const TG_LINK = /^tg:\/\/user\?id=(\d{1,20})$/i;

/**
 * Extracts a chat-account id when the identifier is structurally one.
 * Supports: numeric id, mention wrapper (`<@123>`, `<@!123>`), and
 * `tg://user?id=123` links. Returns null for anything else.
 */
export function parseChatId(identifier: string): string | null {
	const trimmed = identifier.trim();

	if (NUMERIC_ID.test(trimmed)) {
		return trimmed;
	}

	const mention = MENTION.exec(trimmed) ?? TG_LINK.exec(trimmed);
	return mention ? mention[1] : null;
}

/**
 * Normalises an identifier for name lookups: trims it, unwraps chat-id
 * forms and drops a leading `@`.
 */
export function cleanIdentifier(identifier: string): string {
	const trimmed = identifier.trim();
	const chatId = parseChatId(trimmed);
	if (chatId) {
		return chatId;
	}
	return trimmed.startsWith("@") ? trimmed.substring(1) : trimmed;
}
