// ---------------------------------------------------------------------------
// Rollbar Configuration
// Singleton instance with environment detection, test/E2E no-op, PII filtering,
// sampling rates, and structured error reporting.
// ---------------------------------------------------------------------------

import Rollbar from "rollbar";
import { isTelemetryConsentGranted } from "./privacy";

type LogFn = (message: string | Error, extra?: Record<string, unknown>) => void;

/** The subset of the Rollbar API the server code calls. */
export interface ServerLogger {
	critical: LogFn;
	error: LogFn;
	warning: LogFn;
	warn: LogFn;
	info: LogFn;
	debug: LogFn;
}

// ── Enablement rules ──────────────────────────────────────────────────────

const isE2EMode = process.env.E2E_TEST === "1";
const isTestMode =
	process.env.NODE_ENV === "test" ||
	// Vitest uses VITEST, VITEST_POOL_ID
	typeof process.env.VITEST !== "undefined";
const isDevelopment = process.env.NODE_ENV === "development";
const isExplicitlyEnabled =
	process.env.ROLLBAR_ENABLED === "1" || process.env.ROLLBAR_ENABLED === "true";

function readNumberEnv(name: string, fallback: number): number {
	const v = process.env[name];
	if (!v) return fallback;
	const n = Number(v);
	return Number.isFinite(n) ? n : fallback;
}

// ── Base configuration ────────────────────────────────────────────────────

const baseConfig = {
	// In development, disable automatic capture to reduce noise; errors are still
	// reported explicitly via reportError() / logLectureFailure() etc.
	captureUncaught: !isDevelopment,
	captureUnhandledRejections: !isDevelopment,
	environment: process.env.NODE_ENV || "development",
	enabled: isExplicitlyEnabled && !isE2EMode && !isTestMode,
};

const noop: LogFn = () => {};

function createServerInstance(): ServerLogger {
	// In test mode, use a no-op instance to avoid network calls.
	if (isTestMode) {
		return {
			critical: noop,
			error: noop,
			warning: noop,
			warn: noop,
			info: noop,
			debug: noop,
		};
	}

	const rollbar = new Rollbar({
		accessToken: isE2EMode ? "dummy-token-for-e2e" : process.env.ROLLBAR_SERVER_TOKEN,
		...baseConfig,
		payload: {
			server: { root: process.cwd() },
		},
		// PII filtering: always scrub secrets; scrub user-identifying fields when consent is not granted
		scrubFields: [
			"password",
			"apiKey",
			"api_key",
			"secret",
			"token",
			"authorization",
			...(isTelemetryConsentGranted() ? [] : ["user_ip", "ip_address", "person"]),
		],
	});

	return {
		critical: (message, extra) => rollbar.critical(message, extra),
		error: (message, extra) => rollbar.error(message, extra),
		warning: (message, extra) => rollbar.warning(message, extra),
		warn: (message, extra) => rollbar.warn(message, extra),
		info: (message, extra) => rollbar.info(message, extra),
		debug: (message, extra) => rollbar.debug(message, extra),
	};
}

// Server-side singleton instance
export const serverInstance: ServerLogger = createServerInstance();

// ── Severity & Error Context ──────────────────────────────────────────────

export const ErrorSeverity = {
	CRITICAL: "critical",
	ERROR: "error",
	WARNING: "warning",
	INFO: "info",
	DEBUG: "debug",
} as const;

export type ErrorSeverityType = (typeof ErrorSeverity)[keyof typeof ErrorSeverity];

export interface ErrorContext {
	requestId?: string;
	route?: string;
	method?: string;
	userAgent?: string;
	ip?: string;
	timestamp?: Date;
	additionalData?: Record<string, unknown>;
}

export function createErrorContext(request?: Request, requestId?: string): ErrorContext {
	return {
		requestId,
		route: request ? new URL(request.url).pathname : undefined,
		method: request?.method,
		userAgent: request?.headers.get("user-agent") || undefined,
		ip: request?.headers.get("x-forwarded-for") || request?.headers.get("x-real-ip") || undefined,
		timestamp: new Date(),
	};
}

// ── Structured error reporting with sampling ──────────────────────────────

export function reportError(
	error: Error | string,
	context?: ErrorContext,
	severity: ErrorSeverityType = ErrorSeverity.ERROR,
): void {
	if (!baseConfig.enabled) return;

	try {
		const rateAll = readNumberEnv("ROLLBAR_SAMPLE_RATE_ALL", 1);
		const rateInfo = readNumberEnv("ROLLBAR_SAMPLE_RATE_INFO", 0.05);
		const rateWarn = readNumberEnv("ROLLBAR_SAMPLE_RATE_WARN", 0.05);
		const rateError = readNumberEnv("ROLLBAR_SAMPLE_RATE_ERROR", 1);
		const rateCritical = readNumberEnv("ROLLBAR_SAMPLE_RATE_CRITICAL", 1);

		const pick = (rate: number) =>
			Math.random() < Math.max(0, Math.min(1, rate)) && Math.random() < rateAll;

		const includePII = isTelemetryConsentGranted();
		const rollbarContext: Record<string, unknown> = {
			request: {
				id: context?.requestId,
				url: context?.route,
				method: context?.method,
				// Only include IP and User-Agent when PII consent is granted
				user_ip: includePII ? context?.ip : undefined,
				headers: includePII ? { "User-Agent": context?.userAgent } : undefined,
			},
			custom: {
				timestamp: context?.timestamp?.toISOString(),
				...context?.additionalData,
			},
		};

		switch (severity) {
			case ErrorSeverity.CRITICAL:
				if (pick(rateCritical)) serverInstance.critical(error, rollbarContext);
				break;
			case ErrorSeverity.WARNING:
				if (pick(rateWarn)) serverInstance.warning(error, rollbarContext);
				break;
			case ErrorSeverity.INFO:
				if (pick(rateInfo)) serverInstance.info(error, rollbarContext);
				break;
			case ErrorSeverity.DEBUG:
				if (pick(rateInfo)) serverInstance.debug(error, rollbarContext);
				break;
			default:
				if (pick(rateError)) serverInstance.error(error, rollbarContext);
		}
	} catch (reportFailure) {
		// Reporting failures are non-fatal
		console.error("Rollbar reporting failed", reportFailure);
	}
}
