// ---------------------------------------------------------------------------
// Roadmap helpers
// ---------------------------------------------------------------------------

import type { RoadmapDay } from "@/lib/ai/schemas";

export interface SyllabusTopicEntry {
	day: number | string | null;
	date: string | null;
	main_topic: string | null;
	subtopics: string[];
}

/**
 * Every day's main topic followed by its subtopics, de-duplicated (exact
 * match) in first-seen order.
 */
export function flattenRoadmap(roadmap: RoadmapDay[]): string[] {
	const seen = new Set<string>();
	for (const day of roadmap) {
		if (day.main_topic) seen.add(day.main_topic);
		for (const subtopic of day.subtopics) seen.add(subtopic);
	}
	return [...seen];
}

/** The topic skeleton of a roadmap, without objectives, readings etc. */
export function toTopicStructure(roadmap: RoadmapDay[]): SyllabusTopicEntry[] {
	return roadmap.map((day) => ({
		day: day.day ?? null,
		date: day.date ?? null,
		main_topic: day.main_topic ?? null,
		subtopics: day.subtopics,
	}));
}
