// ---------------------------------------------------------------------------
// Analytics — Response Types
// Keys are snake_case; dashboards consume them verbatim.
// ---------------------------------------------------------------------------

export interface QuestionsPerClass {
	class_id: number;
	/** null when quiz_json is missing or not JSON */
	questions: number | null;
}

export interface TopicsOverview {
	class_id: number;
	topics: number;
	subtopics: number;
}

export interface TranscriptLength {
	class_id: number;
	word_count: number | null;
}

export interface SummaryMetrics {
	class_id: number;
	main_ideas_count: number;
	has_takeaway: boolean;
}

export interface SyllabusCoverageEstimate {
	unique_topics_covered: number;
	lectures_count: number;
	avg_topics_per_class: number;
}

export interface LectureTimelineEntry {
	class_id: number;
	date: string | null;
}

export interface DashboardMetrics {
	questions_per_class: QuestionsPerClass[];
	topics_overview: TopicsOverview[];
	transcript_length: TranscriptLength[];
	summary_metrics: SummaryMetrics[];
	syllabus_coverage: SyllabusCoverageEstimate;
	lecture_timeline: LectureTimelineEntry[];
}
