// ---------------------------------------------------------------------------
// Database Schema — lectures table
// JSON payloads from the model are stored verbatim as text columns
// ---------------------------------------------------------------------------

import { sql } from "drizzle-orm";
import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const LECTURE_STATUSES = ["PROCESSING", "DONE", "FAILED"] as const;

export type LectureStatus = (typeof LECTURE_STATUSES)[number];

export const lectures = sqliteTable("lectures", {
	id: integer("id").primaryKey({ autoIncrement: true }),
	status: text("status", { enum: LECTURE_STATUSES }).notNull().default("PROCESSING"),
	transcript: text("transcript"),
	/** `summaryInsight` */
	summary: text("summary"),
	/** `topicsCovered` */
	topicsJson: text("topics_json"),
	/** `questionsAsked` */
	quizJson: text("quiz_json"),
	/** `keyPoints` */
	keyPointsJson: text("key_points_json"),
	/** `examplesUsed` */
	examplesJson: text("examples_json"),
	ldaTopicsJson: text("lda_topics_json"),
	notesJson: text("notes_json"),
	createdAt: text("created_at")
		.notNull()
		.default(sql`CURRENT_TIMESTAMP`),
});

export type Lecture = typeof lectures.$inferSelect;
export type NewLecture = typeof lectures.$inferInsert;

/**
 * DDL applied on startup. Mirrors `lectures` above; there is no migration
 * history, the table is created once if absent.
 */
export const CREATE_LECTURES_TABLE = `
CREATE TABLE IF NOT EXISTS lectures (
	id INTEGER PRIMARY KEY AUTOINCREMENT,
	status TEXT NOT NULL DEFAULT 'PROCESSING',
	transcript TEXT,
	summary TEXT,
	topics_json TEXT,
	quiz_json TEXT,
	key_points_json TEXT,
	examples_json TEXT,
	lda_topics_json TEXT,
	notes_json TEXT,
	created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);
CREATE INDEX IF NOT EXISTS ix_lectures_status ON lectures (status);
`;
