import type { ChatMessage } from "./types";

// CJK ideographs, CJK punctuation and full-width forms
const WIDE_CHAR = /[　-〿㐀-䶿一-鿿豈-﫿＀-￯]/;

// Role and separator tokens the chat format adds around each message
const MESSAGE_OVERHEAD = 4;

/**
 * Rough token count: one per CJK character, one per four other characters.
 * Only used until the provider reports real totals.
 */
export function estimateTokens(text: string): number {
  let wide = 0;
  let narrow = 0;
  for (const ch of text) {
    if (WIDE_CHAR.test(ch)) wide += 1;
    else narrow += 1;
  }
  return wide + Math.ceil(narrow / 4);
}

export function estimatePromptTokens(messages: readonly ChatMessage[]): number {
  return messages.reduce(
    (sum, message) => sum + MESSAGE_OVERHEAD + estimateTokens(message.content),
    0
  );
}
