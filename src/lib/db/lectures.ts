// ---------------------------------------------------------------------------
// Lecture Repository
// ---------------------------------------------------------------------------

import { asc, eq } from "drizzle-orm";
import type { AppDatabase } from "./client";
import { type Lecture, type LectureStatus, type NewLecture, lectures } from "./schema";

export type LecturePatch = Partial<Omit<NewLecture, "id" | "createdAt">>;

/** Insert a new lecture row in `PROCESSING` state. */
export function createLecture(db: AppDatabase): Lecture {
	return db.insert(lectures).values({ status: "PROCESSING" }).returning().get();
}

export function getLectureById(db: AppDatabase, id: number): Lecture | null {
	return db.select().from(lectures).where(eq(lectures.id, id)).get() ?? null;
}

/**
 * Apply a partial update. Returns false when no row has the given id.
 */
export function updateLecture(db: AppDatabase, id: number, patch: LecturePatch): boolean {
	const result = db.update(lectures).set(patch).where(eq(lectures.id, id)).run();
	return result.changes > 0;
}

export function listLecturesByStatus(db: AppDatabase, status: LectureStatus): Lecture[] {
	return db.select().from(lectures).where(eq(lectures.status, status)).orderBy(asc(lectures.id)).all();
}

export interface LectureResponse {
	id: number;
	status: Lecture["status"];
	transcript: string | null;
	summary: string | null;
	topics_json: string | null;
	quiz_json: string | null;
}

/** Public view of a lecture row. */
export function toLectureResponse(lecture: Lecture): LectureResponse {
	return {
		id: lecture.id,
		status: lecture.status,
		transcript: lecture.transcript,
		summary: lecture.summary,
		topics_json: lecture.topicsJson,
		quiz_json: lecture.quizJson,
	};
}
