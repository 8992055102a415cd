// ---------------------------------------------------------------------------
// Lecture Processor Factory
// ---------------------------------------------------------------------------

import { getLectureAiService } from "@/lib/ai/factory";
import { loadConfig } from "@/lib/config";
import { getDb } from "@/lib/db/client";
import { LectureProcessor } from "./pipeline";

export function createLectureProcessor(): LectureProcessor {
	const config = loadConfig();
	return new LectureProcessor({
		db: getDb(),
		ai: getLectureAiService(),
		topicModel: {
			numTopics: config.LDA_NUM_TOPICS,
			passes: config.LDA_PASSES,
			numWords: config.LDA_NUM_WORDS,
		},
	});
}
