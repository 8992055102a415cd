// ---------------------------------------------------------------------------
// Analytics Service
// Dashboard metrics over lectures that finished processing
// ---------------------------------------------------------------------------

import { TopicEntrySchema } from "@/lib/ai/schemas";
import type { AppDatabase } from "@/lib/db/client";
import { listLecturesByStatus } from "@/lib/db/lectures";
import { roundTo } from "@/lib/utils/round";
import { sql } from "drizzle-orm";
import { readSummaryInsight, readTopicEntries } from "./json-columns";
import type {
	DashboardMetrics,
	LectureTimelineEntry,
	QuestionsPerClass,
	SummaryMetrics,
	SyllabusCoverageEstimate,
	TopicsOverview,
	TranscriptLength,
} from "./types";

export class AnalyticsService {
	constructor(private readonly db: AppDatabase) {}

	/** Number of entries in `quiz_json` per lecture; null for a missing or unreadable column. */
	getQuestionsPerClass(): QuestionsPerClass[] {
		return this.db.all<QuestionsPerClass>(sql`
			SELECT id AS class_id,
			       CASE WHEN json_valid(quiz_json) THEN json_array_length(quiz_json) END AS questions
			FROM lectures
			WHERE status = 'DONE'
			ORDER BY id
		`);
	}

	/**
	 * Entry and total subtopic counts per lecture, whatever the entries hold.
	 * Unreadable JSON counts as zero.
	 */
	getTopicsOverview(): TopicsOverview[] {
		return listLecturesByStatus(this.db, "DONE").map((lecture) => {
			const entries = readTopicEntries(lecture.topicsJson) ?? [];
			let subtopics = 0;
			for (const entry of entries) {
				const parsed = TopicEntrySchema.safeParse(entry);
				if (parsed.success) subtopics += parsed.data.subtopics.length;
			}
			return { class_id: lecture.id, topics: entries.length, subtopics };
		});
	}

	/** Approximate words per transcript (spaces + 1). */
	getTranscriptLength(): TranscriptLength[] {
		return this.db.all<TranscriptLength>(sql`
			SELECT id AS class_id,
			       length(transcript) - length(replace(transcript, ' ', '')) + 1 AS word_count
			FROM lectures
			WHERE status = 'DONE'
			ORDER BY id
		`);
	}

	getSummaryMetrics(): SummaryMetrics[] {
		return listLecturesByStatus(this.db, "DONE").map((lecture) => {
			const insight = readSummaryInsight(lecture.summary);
			return {
				class_id: lecture.id,
				main_ideas_count: insight?.mainIdeas.length ?? 0,
				has_takeaway: Boolean(insight?.keyTakeaway),
			};
		});
	}

	/** Unique main topics across all finished lectures; an entry without one counts as "". */
	getSyllabusCoverage(): SyllabusCoverageEstimate {
		const done = listLecturesByStatus(this.db, "DONE");
		const uniqueTopics = new Set<string>();
		for (const lecture of done) {
			for (const entry of readTopicEntries(lecture.topicsJson) ?? []) {
				const parsed = TopicEntrySchema.safeParse(entry);
				if (parsed.success) uniqueTopics.add(parsed.data.topic);
			}
		}

		const lecturesCount = done.length;
		return {
			unique_topics_covered: uniqueTopics.size,
			lectures_count: lecturesCount,
			avg_topics_per_class: lecturesCount > 0 ? roundTo(uniqueTopics.size / lecturesCount, 2) : 0,
		};
	}

	/** Creation date of each lecture, oldest first. */
	getLectureTimeline(): LectureTimelineEntry[] {
		return this.db.all<LectureTimelineEntry>(sql`
			SELECT id AS class_id, date(created_at) AS date
			FROM lectures
			WHERE status = 'DONE'
			ORDER BY created_at, id
		`);
	}

	getDashboardMetrics(): DashboardMetrics {
		return {
			questions_per_class: this.getQuestionsPerClass(),
			topics_overview: this.getTopicsOverview(),
			transcript_length: this.getTranscriptLength(),
			summary_metrics: this.getSummaryMetrics(),
			syllabus_coverage: this.getSyllabusCoverage(),
			lecture_timeline: this.getLectureTimeline(),
		};
	}
}

