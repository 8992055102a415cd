// ---------------------------------------------------------------------------
// Environment Configuration Loader
// Validates all env vars on first use with Zod
// ---------------------------------------------------------------------------
//
// Recommended flag values per environment:
//
// ┌──────────────────────────────┬──────────┬──────────┬──────────┐
// │ Flag                         │ Local    │ CI/Test  │ Prod     │
// ├──────────────────────────────┼──────────┼──────────┼──────────┤
// │ ROLLBAR_ENABLED              │ 0        │ 0        │ 1        │
// │ E2E_TEST                     │ 0        │ 1        │ 0        │
// │ TELEMETRY_CONSENT            │ 0        │ 0        │ 0 *      │
// │ ROLLBAR_ALLOW_PII            │ 0        │ 0        │ 0 *      │
// │ ROLLBAR_SAMPLE_RATE_INFO     │ 1        │ —        │ 0.05     │
// │ ROLLBAR_SAMPLE_RATE_ERROR    │ 1        │ —        │ 1        │
// └──────────────────────────────┴──────────┴──────────┴──────────┘
// * Set to 1 only with explicit user consent.
// ---------------------------------------------------------------------------

import { z } from "zod";

/**
 * Coerce environment variable strings to booleans for use in Zod schemas.
 *
 * Truthy values: `"1"`, `1`, `true`, `"true"`
 * Falsy values:  `"0"`, `0`, `false`, `"false"`; anything else fails validation.
 *
 * @param defaultValue - The default when the env var is not set.
 */
const envBool = (defaultValue: boolean) =>
	z
		.preprocess((v) => {
			if (v == null || v === "") return undefined;
			if (v === "1" || v === 1 || v === true || v === "true") return true;
			if (v === "0" || v === 0 || v === false || v === "false") return false;
			return v;
		}, z.boolean().optional())
		.transform((v) => v ?? defaultValue);

const sampleRate = (defaultValue: number) => z.coerce.number().min(0).max(1).default(defaultValue);

const EnvSchema = z
	.object({
		// Hosted model gateway (OpenAI-compatible)
		OPENAI_API_KEY: z.string().min(1),
		OPENAI_API_BASE: z.string().url().optional(),

		// Model selection
		TRANSCRIPTION_MODEL: z.string().min(1).default("whisper-large-v3"),
		ANALYSIS_MODEL: z.string().min(1).default("llama-3.3-70b-instruct"),
		SYLLABUS_MODEL: z.string().min(1).default("llama-3.1-70b-instruct"),
		// Forwarded as request metadata so the gateway can attribute traces
		LLM_TRACE_USER_ID: z.string().min(1).default("faculty_demo"),

		// Storage
		DATABASE_PATH: z.string().min(1).default("lecture-analytics.db"),
		UPLOAD_DIR: z.string().min(1).default("temp_uploads"),
		SYLLABUS_RESULTS_DIR: z.string().min(1).default("temp_uploads/syllabus_results"),

		// Topic model
		LDA_NUM_TOPICS: z.coerce.number().int().positive().default(3),
		LDA_PASSES: z.coerce.number().int().positive().default(10),
		LDA_NUM_WORDS: z.coerce.number().int().positive().default(5),

		// Rollbar
		ROLLBAR_SERVER_TOKEN: z.string().default(""),
		ROLLBAR_ENABLED: envBool(false),
		ROLLBAR_SAMPLE_RATE_ALL: sampleRate(1),
		ROLLBAR_SAMPLE_RATE_INFO: sampleRate(0.05),
		ROLLBAR_SAMPLE_RATE_WARN: sampleRate(0.05),
		ROLLBAR_SAMPLE_RATE_ERROR: sampleRate(1),
		ROLLBAR_SAMPLE_RATE_CRITICAL: sampleRate(1),

		// Privacy
		TELEMETRY_CONSENT: envBool(false),
		ROLLBAR_ALLOW_PII: envBool(false),

		// E2E Testing
		E2E_TEST: envBool(false),
	})
	.refine((env) => !env.ROLLBAR_ENABLED || env.ROLLBAR_SERVER_TOKEN.length > 0, {
		message: "ROLLBAR_SERVER_TOKEN required when ROLLBAR_ENABLED=true",
		path: ["ROLLBAR_SERVER_TOKEN"],
	});

export type AppConfig = z.infer<typeof EnvSchema>;

let _config: AppConfig | null = null;

/**
 * Load and validate environment configuration.
 * Throws a descriptive error if any required env var is missing or invalid.
 * Result is cached after first successful load.
 */
export function loadConfig(): AppConfig {
	if (_config) return _config;

	const result = EnvSchema.safeParse(process.env);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
		throw new Error(`Environment configuration invalid:\n${issues}`);
	}

	_config = result.data;
	return _config;
}

/** Reset cached config (for testing). */
export function resetConfig(): void {
	_config = null;
}
