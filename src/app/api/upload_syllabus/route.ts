// ---------------------------------------------------------------------------
// POST /api/upload_syllabus — Syllabus (PDF/DOCX) → roadmap + coverage stats
// ---------------------------------------------------------------------------

import { join } from "node:path";
import { LlmResponseParseError } from "@/lib/ai/errors";
import { loadConfig } from "@/lib/config";
import { logSyllabusEvent } from "@/lib/monitoring/lecture-logger";
import { createErrorContext, reportError } from "@/lib/monitoring/rollbar-official";
import { detectSyllabusFormat } from "@/lib/syllabus/extract";
import { createSyllabusService } from "@/lib/syllabus/factory";
import { readUploadedFile, safeFilename, saveUpload } from "@/lib/uploads/file-store";
import { createApiLogger } from "@/lib/utils/api-logger";
import { ErrorCodes, createErrorResponse, createSuccessResponse } from "@/lib/utils/api-response";

export async function POST(request: Request): Promise<Response> {
	const logger = createApiLogger(request);

	const file = await readUploadedFile(request);
	if (!file) {
		return createErrorResponse(
			"Multipart field 'file' is required",
			ErrorCodes.VALIDATION_ERROR,
			logger.requestId,
			400,
		);
	}

	const filename = safeFilename(file.name);
	if (!detectSyllabusFormat(filename)) {
		logger.warn("Syllabus rejected: unsupported file type", { filename });
		return createErrorResponse(
			"Unsupported file type. Please upload PDF or DOCX.",
			ErrorCodes.UNSUPPORTED_FILE_TYPE,
			logger.requestId,
			400,
		);
	}

	try {
		const filePath = await saveUpload(file, join(loadConfig().UPLOAD_DIR, "syllabus"));
		const result = await createSyllabusService().processSyllabusFile(filePath, filename);

		logger.trackRequestCompletion(200);
		return createSuccessResponse({ filename, coverage_result: result }, logger.requestId);
	} catch (err) {
		const error = err instanceof Error ? err : new Error(String(err));
		logSyllabusEvent(filename, "processing failed", error);
		reportError(error, createErrorContext(request, logger.requestId));

		const code =
			err instanceof LlmResponseParseError
				? ErrorCodes.EXTERNAL_SERVICE_ERROR
				: ErrorCodes.SYLLABUS_PROCESSING_FAILED;
		logger.trackRequestCompletion(500);
		return createErrorResponse(
			`Syllabus processing failed: ${error.message}`,
			code,
			logger.requestId,
			500,
		);
	}
}
