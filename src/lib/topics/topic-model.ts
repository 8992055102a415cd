// ---------------------------------------------------------------------------
// Transcript topic modeling
// ---------------------------------------------------------------------------

import { fitLda, formatTopicTerms } from "./lda";
import { tokenize } from "./tokenize";

export const NO_TOPICS_MESSAGE = "No topics generated (short transcript).";

export interface TopicModelOptions {
	numTopics: number;
	passes: number;
	numWords: number;
	seed?: number;
}

/**
 * Summarise a transcript as `Topic <n>: <terms>` lines. A transcript with no
 * usable words yields a single explanatory line instead.
 */
export function extractLdaTopics(transcript: string, options: TopicModelOptions): string[] {
	const tokens = tokenize(transcript);
	if (tokens.length === 0) {
		return [NO_TOPICS_MESSAGE];
	}

	const model = fitLda([tokens], {
		numTopics: options.numTopics,
		passes: options.passes,
		seed: options.seed,
	});

	return Array.from(
		{ length: options.numTopics },
		(_, k) => `Topic ${k + 1}: ${formatTopicTerms(model.topTerms(k, options.numWords))}`,
	);
}
