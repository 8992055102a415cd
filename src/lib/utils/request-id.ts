// ---------------------------------------------------------------------------
// Request ID utilities for tracking requests across the application
// ---------------------------------------------------------------------------

import { v4 as uuidv4 } from "uuid";

/**
 * Request context interface
 */
export interface RequestContext {
	id: string;
	timestamp: string;
	method: string;
	url: string;
	/** Inbound correlation id provided by upstream (x-request-id or x-trace-id) */
	externalId?: string;
	userAgent?: string;
	ip?: string;
}

/**
 * Generate a unique request ID (RFC4122 v4 UUID)
 */
export function generateRequestId(): string {
	return uuidv4();
}

/**
 * Retrieve an external/inbound request ID from headers if present.
 * For correlation only — not used as canonical ID.
 */
export function getExternalRequestIdFromHeaders(headers: Headers): string | undefined {
	return headers.get("x-request-id") || headers.get("x-trace-id") || undefined;
}

/**
 * Create request context from an incoming request
 */
export function createRequestContext(request: Request, requestId?: string): RequestContext {
	return {
		id: requestId || generateRequestId(),
		timestamp: new Date().toISOString(),
		method: request.method,
		url: request.url,
		externalId: getExternalRequestIdFromHeaders(request.headers),
		userAgent: request.headers.get("user-agent") || undefined,
		ip: request.headers.get("x-forwarded-for") || request.headers.get("x-real-ip") || undefined,
	};
}
