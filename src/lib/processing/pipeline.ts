// ---------------------------------------------------------------------------
// Lecture Processing Pipeline
// transcribe → analyse → notes → topic model → persist, then clean up the
// upload directory whatever the outcome
// ---------------------------------------------------------------------------

import { rm } from "node:fs/promises";
import { dirname } from "node:path";
import type { LectureAiService } from "@/lib/ai/lecture-ai";
import type { LectureNotes } from "@/lib/ai/schemas";
import type { AppDatabase } from "@/lib/db/client";
import { getLectureById, updateLecture } from "@/lib/db/lectures";
import {
	type PipelineStage,
	logLectureFailure,
	logLectureInfo,
	logLectureWarning,
} from "@/lib/monitoring/lecture-logger";
import { type TopicModelOptions, extractLdaTopics } from "@/lib/topics/topic-model";

export interface LectureProcessorDeps {
	db: AppDatabase;
	ai: Pick<LectureAiService, "transcribe" | "analyzeLecture" | "generateNotes">;
	topicModel: TopicModelOptions;
}

export type ProcessingOutcome = "DONE" | "FAILED" | "MISSING";

export class LectureProcessor {
	constructor(private readonly deps: LectureProcessorDeps) {}

	/**
	 * Process an uploaded recording for an existing lecture row. Never throws:
	 * failures mark the lecture FAILED.
	 */
	async processLectureFile(lectureId: number, filePath: string): Promise<ProcessingOutcome> {
		const { db, ai } = this.deps;
		let stage: PipelineStage = "transcription";

		try {
			if (!getLectureById(db, lectureId)) {
				logLectureWarning(lectureId, stage, "lecture not found, skipping");
				return "MISSING";
			}

			const transcript = await ai.transcribe(filePath);
			updateLecture(db, lectureId, { transcript });
			logLectureInfo(lectureId, stage, "transcript saved", { characters: transcript.length });

			stage = "analysis";
			const analysis = await ai.analyzeLecture(transcript);

			stage = "notes";
			const notes = await this.tryGenerateNotes(lectureId, transcript);

			stage = "topic-model";
			const ldaTopics = this.tryExtractTopics(lectureId, transcript);

			stage = "persist";
			updateLecture(db, lectureId, {
				summary: JSON.stringify(analysis.summaryInsight),
				topicsJson: JSON.stringify(analysis.topicsCovered),
				quizJson: JSON.stringify(analysis.questionsAsked),
				keyPointsJson: JSON.stringify(analysis.keyPoints),
				examplesJson: JSON.stringify(analysis.examplesUsed),
				ldaTopicsJson: JSON.stringify(ldaTopics),
				notesJson: notes ? JSON.stringify(notes) : null,
				status: "DONE",
			});
			logLectureInfo(lectureId, stage, "processing complete");
			return "DONE";
		} catch (err) {
			logLectureFailure(lectureId, stage, err);
			this.markFailed(lectureId);
			return "FAILED";
		} finally {
			await this.cleanup(lectureId, filePath);
		}
	}

	private async tryGenerateNotes(lectureId: number, transcript: string): Promise<LectureNotes | null> {
		try {
			return await this.deps.ai.generateNotes(transcript);
		} catch (err) {
			logLectureFailure(lectureId, "notes", err);
			return null;
		}
	}

	private tryExtractTopics(lectureId: number, transcript: string): string[] {
		try {
			return extractLdaTopics(transcript, this.deps.topicModel);
		} catch (err) {
			logLectureFailure(lectureId, "topic-model", err);
			return [];
		}
	}

	private markFailed(lectureId: number): void {
		try {
			updateLecture(this.deps.db, lectureId, { status: "FAILED" });
		} catch (err) {
			logLectureFailure(lectureId, "persist", err);
		}
	}

	private async cleanup(lectureId: number, filePath: string): Promise<void> {
		const uploadDir = dirname(filePath);
		try {
			await rm(uploadDir, { recursive: true, force: true });
		} catch (err) {
			logLectureFailure(lectureId, "cleanup", err);
		}
	}
}
