// ---------------------------------------------------------------------------
// Uploaded file handling — multipart field extraction and disk storage
// ---------------------------------------------------------------------------

import { mkdir, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";

/**
 * Reduce a client-supplied filename to a bare file name. Directory parts are
 * dropped so an upload can never escape its target directory.
 */
export function safeFilename(name: string, fallback = "upload"): string {
	const base = basename(name.replaceAll("\\", "/")).trim();
	if (!base || base === "." || base === "..") return fallback;
	return base;
}

/**
 * The `file` field of a multipart form, or null when it is missing or not a
 * file part.
 */
export async function readUploadedFile(request: Request, field = "file"): Promise<File | null> {
	let form: FormData;
	try {
		form = await request.formData();
	} catch {
		return null;
	}
	const value = form.get(field);
	return value instanceof File ? value : null;
}

/** Write an uploaded file into `dir` (created if needed) and return its path. */
export async function saveUpload(file: File, dir: string): Promise<string> {
	await mkdir(dir, { recursive: true });
	const filePath = join(dir, safeFilename(file.name));
	await writeFile(filePath, Buffer.from(await file.arrayBuffer()));
	return filePath;
}
