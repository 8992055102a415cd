// ---------------------------------------------------------------------------
// Syllabus text extraction (PDF, DOCX)
// ---------------------------------------------------------------------------

import { readFile } from "node:fs/promises";
import mammoth from "mammoth";
import { UnsupportedFileTypeError } from "./errors";

export type SyllabusFormat = "pdf" | "docx";

export function detectSyllabusFormat(filename: string): SyllabusFormat | null {
	const lower = filename.toLowerCase();
	if (lower.endsWith(".pdf")) return "pdf";
	if (lower.endsWith(".docx")) return "docx";
	return null;
}

async function extractPdfText(filePath: string): Promise<string> {
	// Loaded on demand: pdf-parse reads a bundled sample file when imported without a parent module
	const { default: pdfParse } = await import("pdf-parse");
	const data = await pdfParse(await readFile(filePath));
	return data.text;
}

async function extractDocxText(filePath: string): Promise<string> {
	const { value } = await mammoth.extractRawText({ path: filePath });
	return value
		.split("\n")
		.filter((paragraph) => paragraph.trim())
		.join("\n");
}

/**
 * Plain text of a syllabus document, chosen by file extension.
 *
 * @throws UnsupportedFileTypeError for anything but .pdf and .docx
 */
export async function extractText(filePath: string): Promise<string> {
	switch (detectSyllabusFormat(filePath)) {
		case "pdf":
			return extractPdfText(filePath);
		case "docx":
			return extractDocxText(filePath);
		default:
			throw new UnsupportedFileTypeError(filePath);
	}
}
