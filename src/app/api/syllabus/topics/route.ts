// ---------------------------------------------------------------------------
// GET /api/syllabus/topics — Day-by-day topics of the latest syllabus
// ---------------------------------------------------------------------------

import { createSyllabusResultStore } from "@/lib/syllabus/factory";
import { createApiLogger } from "@/lib/utils/api-logger";
import { ErrorCodes, createErrorResponse, createSuccessResponse } from "@/lib/utils/api-response";
import { respondToUnexpectedError } from "@/lib/utils/route-helpers";

export async function GET(request: Request): Promise<Response> {
	const logger = createApiLogger(request);

	try {
		const topics = await createSyllabusResultStore().latestTopicStructure();
		if (topics === null) {
			return createErrorResponse(
				"No syllabus result found yet. Please upload one first.",
				ErrorCodes.NO_SYLLABUS_RESULT,
				logger.requestId,
				404,
			);
		}

		logger.trackRequestCompletion(200);
		return createSuccessResponse(topics, logger.requestId);
	} catch (err) {
		return respondToUnexpectedError(request, logger, err);
	}
}
