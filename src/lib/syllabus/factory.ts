// ---------------------------------------------------------------------------
// Syllabus Service Factory
// ---------------------------------------------------------------------------

import { getLectureAiService } from "@/lib/ai/factory";
import { loadConfig } from "@/lib/config";
import { getDb } from "@/lib/db/client";
import { SyllabusResultStore } from "./results";
import { SyllabusService } from "./service";

/** Reader/writer for saved results; needs no database or model client. */
export function createSyllabusResultStore(): SyllabusResultStore {
	return new SyllabusResultStore(loadConfig().SYLLABUS_RESULTS_DIR);
}

export function createSyllabusService(): SyllabusService {
	return new SyllabusService({
		db: getDb(),
		ai: getLectureAiService(),
		store: createSyllabusResultStore(),
	});
}
