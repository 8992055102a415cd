// ---------------------------------------------------------------------------
// Syllabus Service
// extract text → roadmap via LLM → flatten → coverage → save
// ---------------------------------------------------------------------------

import type { LectureAiService } from "@/lib/ai/lecture-ai";
import type { AppDatabase } from "@/lib/db/client";
import { logSyllabusEvent } from "@/lib/monitoring/lecture-logger";
import { calculateSyllabusCoverage } from "./coverage";
import { extractText } from "./extract";
import type { SyllabusResultStore } from "./results";
import { flattenRoadmap } from "./roadmap";
import type { SyllabusResult } from "./schemas";

export interface SyllabusServiceDeps {
	db: AppDatabase;
	ai: Pick<LectureAiService, "parseSyllabus">;
	store: SyllabusResultStore;
	/** Injected for tests; defaults to the PDF/DOCX extractor */
	extract?: (filePath: string) => Promise<string>;
}

export class SyllabusService {
	private readonly extract: (filePath: string) => Promise<string>;

	constructor(private readonly deps: SyllabusServiceDeps) {
		this.extract = deps.extract ?? extractText;
	}

	/**
	 * Build the roadmap for an uploaded syllabus, compare it with the topics
	 * of finished lectures and persist the combined result.
	 */
	async processSyllabusFile(filePath: string, uploadedFilename: string): Promise<SyllabusResult> {
		const syllabusText = await this.extract(filePath);
		const roadmap = await this.deps.ai.parseSyllabus(syllabusText);
		const topics = flattenRoadmap(roadmap);
		const coverage = calculateSyllabusCoverage(this.deps.db, topics);

		const result: SyllabusResult = {
			coverage_stats: coverage,
			course_roadmap: roadmap,
		};

		const savedTo = await this.deps.store.save(result, uploadedFilename);
		logSyllabusEvent(uploadedFilename, `coverage saved to ${savedTo}`);
		return result;
	}
}
