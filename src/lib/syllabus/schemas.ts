// ---------------------------------------------------------------------------
// Syllabus Module — Zod Schemas
// ---------------------------------------------------------------------------

import { RoadmapDaySchema } from "@/lib/ai/schemas";
import { z } from "zod";

export const CoverageStatsSchema = z.object({
	total_topics: z.number().int().min(0),
	covered_topics: z.number().int().min(0),
	coverage_percentage: z.number().min(0).max(100),
	missing_topics: z.array(z.string()),
	matched_topics: z.array(z.string()),
});

export const SyllabusResultSchema = z.object({
	coverage_stats: CoverageStatsSchema,
	course_roadmap: z.array(RoadmapDaySchema),
});

export type SyllabusResult = z.infer<typeof SyllabusResultSchema>;
