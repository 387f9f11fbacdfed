/**
 * File Processor Example
 * Demonstrates reading files concurrently, with a shared deadline and
 * cancellation on the first unreadable file
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { type Operation, scope, until } from "../src/index.js";

interface FileResult {
	filename: string;
	size: number;
	lines: number;
}

type Stop =
	| { reason: "unreadable"; filename: string; message: string }
	| { reason: "deadline"; ms: number };

/**
 * Read every file in its own job. Any failure cancels the whole batch.
 */
async function processFiles(
	files: string[],
	deadlineMs: number,
): Promise<FileResult[] | Stop> {
	const result = await scope<FileResult[], Stop>(
		function* (s) {
			const jobs = files.map((file) =>
				s.spawn(
					readOne(file, (message) =>
						s.cancel({ reason: "unreadable", filename: file, message }),
					),
					{ name: path.basename(file) },
				),
			);

			const results: FileResult[] = [];
			for (const job of jobs) {
				results.push(yield* job);
			}
			return results;
		},
		{
			name: "file-processor",
			logLevel: "info",
			cancelOn: {
				signal: AbortSignal.timeout(deadlineMs),
				payload: () => ({ reason: "deadline", ms: deadlineMs }),
			},
		},
	);

	return result._tag === "Completed" ? result.value : result.payload;
}

function* readOne(
	file: string,
	fail: (message: string) => void,
): Operation<FileResult> {
	try {
		const content = yield* until(fs.readFile(file, "utf-8"));
		return {
			filename: path.basename(file),
			size: Buffer.byteLength(content),
			lines: content.split("\n").length,
		};
	} catch (error) {
		fail(error instanceof Error ? error.message : String(error));
		return { filename: path.basename(file), size: 0, lines: 0 };
	}
}

/**
 * Demo with temporary files
 */
async function demoFileProcessor() {
	console.log("=== File Processor Demo ===\n");

	const dir = await fs.mkdtemp(path.join(os.tmpdir(), "scopeline-"));
	const files = await Promise.all(
		["a.txt", "b.txt", "c.txt"].map(async (name, i) => {
			const file = path.join(dir, name);
			await fs.writeFile(file, "line\n".repeat(i + 1));
			return file;
		}),
	);

	console.log("All readable:", await processFiles(files, 5000));
	console.log(
		"One missing:",
		await processFiles([...files, path.join(dir, "missing.txt")], 5000),
	);

	await fs.rm(dir, { recursive: true, force: true });
}

demoFileProcessor().catch(console.error);
