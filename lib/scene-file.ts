import { readFileSync, writeFileSync } from "node:fs";
import type { z } from "zod";
import { SceneDocumentSchema } from "./scene-config";

export type SceneDocument = z.infer<typeof SceneDocumentSchema>;

export type ReadSceneResult =
	| { ok: true; document: SceneDocument }
	| {
			ok: false;
			reason: "not-found" | "invalid-json" | "invalid-format";
			message: string;
	  };

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}

/**
 * Read a scene document from disk.
 * A missing or malformed file is reported, not thrown; any other
 * file system error (permissions, I/O) propagates.
 */
export function readSceneFile(path: string): ReadSceneResult {
	let text: string;
	try {
		text = readFileSync(path, "utf-8");
	} catch (error) {
		if (isErrnoException(error) && error.code === "ENOENT") {
			return { ok: false, reason: "not-found", message: `File ${path} not found` };
		}
		throw error;
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		return { ok: false, reason: "invalid-json", message };
	}

	const result = SceneDocumentSchema.safeParse(parsed);
	if (!result.success) {
		return {
			ok: false,
			reason: "invalid-format",
			message: result.error.issues.map((issue) => issue.message).join("; "),
		};
	}
	return { ok: true, document: result.data };
}

/**
 * Write a scene document as indented JSON. Errors propagate to the caller.
 */
export function writeSceneFile(path: string, document: SceneDocument): void {
	writeFileSync(path, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
}
