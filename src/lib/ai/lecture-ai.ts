// ---------------------------------------------------------------------------
// Lecture AI Service
// Transcription, lecture analysis, pedagogical notes and syllabus roadmaps
// ---------------------------------------------------------------------------

import { LlmResponseParseError } from "./errors";
import type { ModelGateway } from "./gateway";
import { extractJsonPayload } from "./json";
import {
	ANALYSIS_SYSTEM_PROMPT,
	NOTES_SYSTEM_PROMPT,
	SYLLABUS_SYSTEM_PROMPT,
	buildAnalysisPrompt,
	buildNotesPrompt,
	buildSyllabusPrompt,
} from "./prompts";
import {
	type LectureAnalysis,
	LectureAnalysisSchema,
	type LectureNotes,
	LectureNotesSchema,
	type RoadmapDay,
	RoadmapDaySchema,
} from "./schemas";

export interface LectureAiModels {
	transcription: string;
	analysis: string;
	syllabus: string;
}

export interface LectureAiOptions {
	models: LectureAiModels;
	traceUserId: string;
}

export class LectureAiService {
	constructor(
		private readonly gateway: ModelGateway,
		private readonly options: LectureAiOptions,
	) {}

	async transcribe(filePath: string): Promise<string> {
		return this.gateway.transcribe({
			model: this.options.models.transcription,
			filePath,
			metadata: this.trace("lecture_transcription"),
		});
	}

	/**
	 * Structured analysis: topics, key points, questions, examples and a
	 * summary insight.
	 *
	 * @throws LlmResponseParseError when the completion is not a JSON object
	 */
	async analyzeLecture(transcript: string): Promise<LectureAnalysis> {
		const content = await this.gateway.complete({
			model: this.options.models.analysis,
			messages: [
				{ role: "system", content: ANALYSIS_SYSTEM_PROMPT },
				{ role: "user", content: buildAnalysisPrompt(transcript) },
			],
			metadata: this.trace("class_topic_analytics_split"),
		});

		const payload = extractJsonPayload(content);
		const parsed = LectureAnalysisSchema.safeParse(payload);
		if (!parsed.success) {
			throw new LlmResponseParseError("Lecture analysis has an unexpected shape", content ?? "");
		}
		return parsed.data;
	}

	/**
	 * @throws LlmResponseParseError when the completion is not a JSON object
	 */
	async generateNotes(transcript: string): Promise<LectureNotes> {
		const content = await this.gateway.complete({
			model: this.options.models.analysis,
			messages: [
				{ role: "system", content: NOTES_SYSTEM_PROMPT },
				{ role: "user", content: buildNotesPrompt(transcript) },
			],
			metadata: this.trace("pedagogical_notes_generation"),
		});

		const parsed = LectureNotesSchema.safeParse(extractJsonPayload(content));
		if (!parsed.success) {
			throw new LlmResponseParseError("Lecture notes are not a JSON object", content ?? "");
		}
		return parsed.data;
	}

	/**
	 * Day-by-day roadmap for a syllabus. Entries that are not objects are
	 * dropped; a top-level object is unwrapped when it holds the array.
	 *
	 * @throws LlmResponseParseError when no roadmap array can be found
	 */
	async parseSyllabus(syllabusText: string): Promise<RoadmapDay[]> {
		const content = await this.gateway.complete({
			model: this.options.models.syllabus,
			messages: [
				{ role: "system", content: SYLLABUS_SYSTEM_PROMPT },
				{ role: "user", content: buildSyllabusPrompt(syllabusText) },
			],
			metadata: this.trace("syllabus_roadmap"),
		});

		const entries = roadmapEntries(extractJsonPayload(content));
		if (!entries) {
			throw new LlmResponseParseError("Could not find a JSON roadmap in model output", content ?? "");
		}

		const days: RoadmapDay[] = [];
		for (const entry of entries) {
			const day = RoadmapDaySchema.safeParse(entry);
			if (day.success) days.push(day.data);
		}
		return days;
	}

	private trace(generationName: string): Record<string, string> {
		return { generation_name: generationName, trace_user_id: this.options.traceUserId };
	}
}

function roadmapEntries(payload: unknown): unknown[] | null {
	if (Array.isArray(payload)) return payload;
	if (payload && typeof payload === "object") {
		const nested = Object.values(payload).find((value) => Array.isArray(value));
		return Array.isArray(nested) ? nested : null;
	}
	return null;
}
