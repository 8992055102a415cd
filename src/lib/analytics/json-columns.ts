// ---------------------------------------------------------------------------
// Readers for JSON text columns
// ---------------------------------------------------------------------------

import { type CoveredTopic, CoveredTopicSchema, SummaryInsightSchema } from "@/lib/ai/schemas";
import type { z } from "zod";

/** The raw entries of a stored JSON array; null when the column holds anything else. */
export function readTopicEntries(column: string | null): unknown[] | null {
	let value: unknown;
	try {
		value = JSON.parse(column ?? "[]");
	} catch {
		return null;
	}
	return Array.isArray(value) ? value : null;
}

/**
 * Parse a stored `topicsCovered` array into entries with a string `topic`,
 * keeping only their string subtopics. Other entries are skipped.
 */
export function readCoveredTopics(column: string | null): CoveredTopic[] | null {
	const entries = readTopicEntries(column);
	if (entries === null) return null;

	const topics: CoveredTopic[] = [];
	for (const entry of entries) {
		const parsed = CoveredTopicSchema.safeParse(entry);
		if (parsed.success) topics.push(parsed.data);
	}
	return topics;
}

export function readSummaryInsight(
	column: string | null,
): z.infer<typeof SummaryInsightSchema> | null {
	try {
		const parsed = SummaryInsightSchema.safeParse(JSON.parse(column ?? "{}"));
		return parsed.success ? parsed.data : null;
	} catch {
		return null;
	}
}
