// ---------------------------------------------------------------------------
// POST /api/upload — Accept a lecture recording and process it in background
// Responds immediately with the new lecture id; poll /api/lecture/[id]
// ---------------------------------------------------------------------------

import { join } from "node:path";
import { loadConfig } from "@/lib/config";
import { type AppDatabase, getDb } from "@/lib/db/client";
import { createLecture, updateLecture } from "@/lib/db/lectures";
import type { Lecture } from "@/lib/db/schema";
import { dispatchBackground } from "@/lib/jobs/background";
import { createErrorContext, reportError } from "@/lib/monitoring/rollbar-official";
import { createLectureProcessor } from "@/lib/processing/factory";
import { readUploadedFile, saveUpload } from "@/lib/uploads/file-store";
import { createApiLogger } from "@/lib/utils/api-logger";
import { ErrorCodes, createErrorResponse, createSuccessResponse } from "@/lib/utils/api-response";

interface LectureUploadResponse {
	lecture_id: number;
	status: "PROCESSING";
}

export async function POST(request: Request): Promise<Response> {
	const logger = createApiLogger(request);

	const file = await readUploadedFile(request);
	if (!file) {
		logger.warn("Upload rejected: no file part");
		return createErrorResponse(
			"Multipart field 'file' is required",
			ErrorCodes.VALIDATION_ERROR,
			logger.requestId,
			400,
		);
	}

	let db: AppDatabase;
	let lecture: Lecture;
	try {
		db = getDb();
		lecture = createLecture(db);
	} catch (err) {
		const error = err instanceof Error ? err : new Error(String(err));
		logger.error("Could not create lecture record", error);
		reportError(error, createErrorContext(request, logger.requestId));
		return createErrorResponse(
			"Could not create the lecture record",
			ErrorCodes.DATABASE_ERROR,
			logger.requestId,
			500,
		);
	}

	let filePath: string;
	try {
		const uploadDir = join(loadConfig().UPLOAD_DIR, `lecture_${lecture.id}`);
		filePath = await saveUpload(file, uploadDir);
	} catch (err) {
		const error = err instanceof Error ? err : new Error(String(err));
		logger.error("Could not store uploaded recording", error, { lectureId: lecture.id });
		try {
			updateLecture(db, lecture.id, { status: "FAILED" });
		} catch (updateErr) {
			logger.error(
				"Could not mark lecture FAILED",
				updateErr instanceof Error ? updateErr : undefined,
				{ lectureId: lecture.id },
			);
		}
		reportError(error, createErrorContext(request, logger.requestId));
		return createErrorResponse(
			"Could not store the uploaded file",
			ErrorCodes.INTERNAL_ERROR,
			logger.requestId,
			500,
		);
	}

	const processor = createLectureProcessor();
	dispatchBackground(`lecture-${lecture.id}`, async () => {
		await processor.processLectureFile(lecture.id, filePath);
	});

	logger.info("Lecture upload accepted", { lectureId: lecture.id, bytes: file.size });
	logger.trackRequestCompletion(202);
	const body: LectureUploadResponse = { lecture_id: lecture.id, status: "PROCESSING" };
	return createSuccessResponse(body, logger.requestId, 202);
}
