// ---------------------------------------------------------------------------
// Syllabus coverage — compare syllabus topics with lecture topics
// ---------------------------------------------------------------------------

import { readCoveredTopics } from "@/lib/analytics/json-columns";
import type { AppDatabase } from "@/lib/db/client";
import { listLecturesByStatus } from "@/lib/db/lectures";
import { roundTo } from "@/lib/utils/round";
import type { z } from "zod";
import type { CoverageStatsSchema } from "./schemas";

export type CoverageStats = z.infer<typeof CoverageStatsSchema>;

export function normalizeTopic(topic: string): string {
	return topic.trim().toLowerCase();
}

/**
 * Normalised topics and subtopics of every finished lecture. Rows whose
 * `topics_json` cannot be read are skipped.
 */
export function collectCoveredTopics(db: AppDatabase): Set<string> {
	const covered = new Set<string>();
	for (const lecture of listLecturesByStatus(db, "DONE")) {
		for (const entry of readCoveredTopics(lecture.topicsJson) ?? []) {
			covered.add(normalizeTopic(entry.topic));
			for (const subtopic of entry.subtopics) covered.add(normalizeTopic(subtopic));
		}
	}
	return covered;
}

/**
 * Split syllabus topics into matched and missing, keeping their order and
 * original spelling.
 */
export function compareTopics(syllabusTopics: string[], covered: ReadonlySet<string>): CoverageStats {
	const matched = syllabusTopics.filter((t) => covered.has(normalizeTopic(t)));
	const missing = syllabusTopics.filter((t) => !covered.has(normalizeTopic(t)));
	const percentage =
		syllabusTopics.length > 0 ? (matched.length / syllabusTopics.length) * 100 : 0;

	return {
		total_topics: syllabusTopics.length,
		covered_topics: matched.length,
		coverage_percentage: roundTo(percentage, 2),
		missing_topics: missing,
		matched_topics: matched,
	};
}

export function calculateSyllabusCoverage(db: AppDatabase, syllabusTopics: string[]): CoverageStats {
	return compareTopics(syllabusTopics, collectCoveredTopics(db));
}
