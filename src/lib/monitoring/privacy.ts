// ---------------------------------------------------------------------------
// Privacy & Consent helpers for telemetry/monitoring.
// Default: no PII attached unless explicit consent.
// ---------------------------------------------------------------------------

/**
 * Returns whether telemetry consent is granted.
 * Environment-driven; there is no per-user consent store.
 */
export function isTelemetryConsentGranted(): boolean {
	return process.env.TELEMETRY_CONSENT === "1" || process.env.ROLLBAR_ALLOW_PII === "1";
}
