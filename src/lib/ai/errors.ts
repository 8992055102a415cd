// ---------------------------------------------------------------------------
// AI Module — Error Types
// ---------------------------------------------------------------------------

export class LlmResponseParseError extends Error {
	constructor(
		message: string,
		public readonly rawContent: string,
	) {
		super(message);
		this.name = "LlmResponseParseError";
	}
}
