// ---------------------------------------------------------------------------
// Lecture AI Factory
// Creates the configured LectureAiService singleton
// ---------------------------------------------------------------------------

import { loadConfig } from "@/lib/config";
import { createOpenAiGateway } from "./gateway";
import { LectureAiService } from "./lecture-ai";

let _service: LectureAiService | null = null;

/**
 * App-lifetime LectureAiService built from environment configuration.
 */
export function getLectureAiService(): LectureAiService {
	if (_service) return _service;

	const config = loadConfig();
	const gateway = createOpenAiGateway({
		apiKey: config.OPENAI_API_KEY,
		baseURL: config.OPENAI_API_BASE,
	});

	_service = new LectureAiService(gateway, {
		models: {
			transcription: config.TRANSCRIPTION_MODEL,
			analysis: config.ANALYSIS_MODEL,
			syllabus: config.SYLLABUS_MODEL,
		},
		traceUserId: config.LLM_TRACE_USER_ID,
	});
	return _service;
}
