// ---------------------------------------------------------------------------
// Logging utilities for API routes with request context using Rollbar
// Structured logging with severity levels
// ---------------------------------------------------------------------------

import { isTelemetryConsentGranted } from "@/lib/monitoring/privacy";
import { serverInstance } from "@/lib/monitoring/rollbar-official";
import { type RequestContext, createRequestContext } from "./request-id";

/**
 * Request-scoped logger that uses Rollbar
 */
export class ApiLogger {
	private startTime: number = Date.now();

	constructor(private requestContext: RequestContext) {}

	get requestId(): string {
		return this.requestContext.id;
	}

	/**
	 * Return a scrubbed copy of the request context.
	 * When PII consent is not granted, `ip` and `userAgent` are stripped.
	 */
	private safeContext(): Omit<RequestContext, "ip" | "userAgent"> & {
		ip?: string;
		userAgent?: string;
	} {
		if (isTelemetryConsentGranted()) return this.requestContext;
		const { ip: _ip, userAgent: _ua, ...safe } = this.requestContext;
		return safe;
	}

	/**
	 * Log an error with structured context via Rollbar
	 */
	error(message: string, error?: Error, data?: unknown): void {
		serverInstance.error(message, {
			requestId: this.requestContext.id,
			error: error?.message,
			stack: error?.stack,
			data,
			context: this.safeContext(),
			timestamp: new Date().toISOString(),
		});
	}

	/**
	 * Log a warning with structured context via Rollbar
	 */
	warn(message: string, data?: unknown): void {
		serverInstance.warn(message, {
			requestId: this.requestContext.id,
			data,
			context: this.safeContext(),
			timestamp: new Date().toISOString(),
		});
	}

	/**
	 * Log info with structured context via Rollbar
	 */
	info(message: string, data?: unknown): void {
		serverInstance.info(message, {
			requestId: this.requestContext.id,
			data,
			context: this.safeContext(),
			timestamp: new Date().toISOString(),
		});
	}

	/**
	 * Track request completion with timing
	 */
	trackRequestCompletion(statusCode: number): void {
		const duration = Date.now() - this.startTime;
		serverInstance.info(
			`Request completed: ${this.requestContext.method} ${this.requestContext.url}`,
			{
				requestId: this.requestContext.id,
				statusCode,
				durationMs: duration,
				context: this.safeContext(),
				timestamp: new Date().toISOString(),
			},
		);
	}
}

/**
 * Create an API logger for an incoming request
 */
export function createApiLogger(request: Request): ApiLogger {
	return new ApiLogger(createRequestContext(request));
}
