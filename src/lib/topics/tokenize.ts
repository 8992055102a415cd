// ---------------------------------------------------------------------------
// Transcript tokenizer for topic modeling
// ---------------------------------------------------------------------------

import englishStopwords from "./stopwords.en.json";

const WORD_PATTERN = /\b[a-zA-Z]{3,}\b/g;

export const ENGLISH_STOPWORDS: ReadonlySet<string> = new Set(englishStopwords);

/**
 * Words of three or more ASCII letters, lower-cased, with stopwords removed.
 */
export function tokenize(text: string, stopwords: ReadonlySet<string> = ENGLISH_STOPWORDS): string[] {
	const tokens: string[] = [];
	for (const match of text.matchAll(WORD_PATTERN)) {
		const word = match[0].toLowerCase();
		if (!stopwords.has(word)) tokens.push(word);
	}
	return tokens;
}
