// ---------------------------------------------------------------------------
// GET /api/syllabus_result — Most recently saved syllabus coverage result
// ---------------------------------------------------------------------------

import { createSyllabusResultStore } from "@/lib/syllabus/factory";
import { createApiLogger } from "@/lib/utils/api-logger";
import { ErrorCodes, createErrorResponse, createSuccessResponse } from "@/lib/utils/api-response";
import { respondToUnexpectedError } from "@/lib/utils/route-helpers";

export async function GET(request: Request): Promise<Response> {
	const logger = createApiLogger(request);

	try {
		const latest = await createSyllabusResultStore().latest();
		if (!latest) {
			return createErrorResponse(
				"No syllabus result found yet.",
				ErrorCodes.NO_SYLLABUS_RESULT,
				logger.requestId,
				404,
			);
		}

		logger.trackRequestCompletion(200);
		return createSuccessResponse(latest, logger.requestId);
	} catch (err) {
		return respondToUnexpectedError(request, logger, err);
	}
}
