// ---------------------------------------------------------------------------
// Standardized API response utilities
// Consistent error/success response shapes for every route
// ---------------------------------------------------------------------------

export interface ApiResponse<T = unknown> {
	success: boolean;
	data?: T;
	error?: {
		code: string;
		message: string;
		details?: Record<string, unknown>;
	};
	meta?: {
		requestId: string;
		timestamp: string;
		version?: string;
	};
}

/**
 * Create an error API response
 */
export function createErrorResponse(
	message: string,
	code: ErrorCode,
	requestId?: string,
	httpStatus?: number,
	details?: Record<string, unknown>,
): Response {
	const errorResponse: ApiResponse<never> = {
		success: false,
		error: { code, message, details },
		meta: {
			requestId: requestId || "unknown",
			timestamp: new Date().toISOString(),
			version: "1.0",
		},
	};

	return Response.json(errorResponse, {
		status: httpStatus || 500,
		headers: {
			"Content-Type": "application/json",
			...(requestId && { "X-Request-ID": requestId }),
		},
	});
}

/**
 * Create a successful API response
 */
export function createSuccessResponse<T>(
	data: T,
	requestId?: string,
	httpStatus?: number,
): Response {
	const successResponse: ApiResponse<T> = {
		success: true,
		data,
		meta: {
			requestId: requestId || "unknown",
			timestamp: new Date().toISOString(),
			version: "1.0",
		},
	};

	return Response.json(successResponse, {
		status: httpStatus || 200,
		headers: {
			"Content-Type": "application/json",
			...(requestId && { "X-Request-ID": requestId }),
		},
	});
}

/**
 * Common error codes
 */
export const ErrorCodes = {
	// Validation
	VALIDATION_ERROR: "VALIDATION_ERROR",
	UNSUPPORTED_FILE_TYPE: "UNSUPPORTED_FILE_TYPE",

	// Resource
	NOT_FOUND: "NOT_FOUND",

	// Server
	INTERNAL_ERROR: "INTERNAL_ERROR",
	DATABASE_ERROR: "DATABASE_ERROR",
	EXTERNAL_SERVICE_ERROR: "EXTERNAL_SERVICE_ERROR",

	// Lectures
	LECTURE_PROCESSING: "LECTURE_PROCESSING",
	NOTES_UNAVAILABLE: "NOTES_UNAVAILABLE",
	NOTES_CORRUPT: "NOTES_CORRUPT",

	// Syllabus
	SYLLABUS_PROCESSING_FAILED: "SYLLABUS_PROCESSING_FAILED",
	NO_SYLLABUS_RESULT: "NO_SYLLABUS_RESULT",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
