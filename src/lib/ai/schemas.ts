// ---------------------------------------------------------------------------
// AI Module — Zod Schemas for model output
// Only the fields the app reads are checked; unknown keys are kept for storage.
// ---------------------------------------------------------------------------

import { z } from "zod";

/** Non-string items are dropped one by one; anything but an array becomes []. */
const stringItems = z
	.array(z.unknown())
	.catch([])
	.transform((items) => items.filter((item): item is string => typeof item === "string"));

// ── Lecture analysis ──────────────────────────────────────────────────────

// Missing and null both fall back to an empty list
const list = z
	.array(z.unknown())
	.nullish()
	.transform((value) => value ?? []);

export const LectureAnalysisSchema = z
	.object({
		topicsCovered: list,
		keyPoints: list,
		questionsAsked: list,
		examplesUsed: list,
		summaryInsight: z
			.record(z.unknown())
			.nullish()
			.transform((value) => value ?? {}),
	})
	.passthrough();

export type LectureAnalysis = z.infer<typeof LectureAnalysisSchema>;

/** A single `topicsCovered` entry, as read back from storage. */
export const CoveredTopicSchema = z
	.object({
		topic: z.string(),
		subtopics: stringItems,
	})
	.passthrough();

export type CoveredTopic = z.infer<typeof CoveredTopicSchema>;

/** Any object entry of `topicsCovered`, counted as-is by the analytics. */
export const TopicEntrySchema = z.object({
	topic: z.string().catch(""),
	subtopics: z.array(z.unknown()).catch([]),
});

export const SummaryInsightSchema = z
	.object({
		mainIdeas: z.array(z.unknown()).catch([]),
		keyTakeaway: z.string().catch(""),
	})
	.passthrough();

// ── Pedagogical notes ─────────────────────────────────────────────────────

export const LectureNotesSchema = z.record(z.unknown());

export type LectureNotes = z.infer<typeof LectureNotesSchema>;

// ── Syllabus roadmap ──────────────────────────────────────────────────────

/**
 * One day of a course roadmap. Only the topic fields are normalised; the
 * rest of the entry is stored exactly as the model wrote it.
 */
export const RoadmapDaySchema = z
	.object({
		day: z.union([z.number(), z.string()]).nullish().catch(null),
		date: z.string().nullish().catch(null),
		main_topic: z.string().nullish().catch(null),
		subtopics: stringItems,
	})
	.passthrough();

export type RoadmapDay = z.infer<typeof RoadmapDaySchema>;
