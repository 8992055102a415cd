// ---------------------------------------------------------------------------
// Route handler helpers shared by the API routes
// ---------------------------------------------------------------------------

import { createErrorContext, reportError } from "@/lib/monitoring/rollbar-official";
import { type ApiLogger, createApiLogger } from "./api-logger";
import { ErrorCodes, createErrorResponse, createSuccessResponse } from "./api-response";

/**
 * Run a read-only handler with request logging. Thrown errors become a 500
 * envelope and are reported to Rollbar.
 */
export async function respondWith<T>(
	request: Request,
	produce: (logger: ApiLogger) => T | Promise<T>,
): Promise<Response> {
	const logger = createApiLogger(request);
	try {
		const data = await produce(logger);
		logger.trackRequestCompletion(200);
		return createSuccessResponse(data, logger.requestId);
	} catch (err) {
		return respondToUnexpectedError(request, logger, err);
	}
}

/** Log and report an error no handler branch expected; answer with a 500 envelope. */
export function respondToUnexpectedError(
	request: Request,
	logger: ApiLogger,
	err: unknown,
): Response {
	const error = err instanceof Error ? err : new Error(String(err));
	logger.error("Request failed", error);
	reportError(error, createErrorContext(request, logger.requestId));
	logger.trackRequestCompletion(500);
	return createErrorResponse(error.message, ErrorCodes.INTERNAL_ERROR, logger.requestId, 500);
}

/** Parse a positive integer path segment; null for anything else. */
export function parsePositiveId(raw: string): number | null {
	if (!/^\d+$/.test(raw)) return null;
	const id = Number(raw);
	return Number.isSafeInteger(id) && id > 0 ? id : null;
}
