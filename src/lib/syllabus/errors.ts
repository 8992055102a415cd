export class UnsupportedFileTypeError extends Error {
	constructor(public readonly filename: string) {
		super("Unsupported file type. Please upload PDF or DOCX.");
		this.name = "UnsupportedFileTypeError";
	}
}
