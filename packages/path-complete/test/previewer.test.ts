import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, before, describe, it } from "node:test";
import {
	PLACEHOLDER_BINARY,
	PLACEHOLDER_EMPTY,
	PLACEHOLDER_UNREADABLE,
	PREVIEW_BYTES,
	type PreviewOperations,
	previewFile,
	splitPreviewLines,
} from "../src/previewer.js";

describe("previewFile", () => {
	let root: string;

	before(async () => {
		root = await mkdtemp(join(tmpdir(), "preview-test-"));
		await writeFile(join(root, "ten.txt"), Array.from({ length: 10 }, (_, i) => `line ${i + 1}`).join("\n"));
		await writeFile(join(root, "empty.txt"), "");
		await writeFile(join(root, "image.bin"), Buffer.from([0x89, 0x50, 0x00, 0x47, 0x0a]));
	});

	after(async () => {
		await rm(root, { recursive: true, force: true });
	});

	it("keeps the first lines and flags truncation", async () => {
		assert.deepEqual(await previewFile(join(root, "ten.txt"), 3), {
			binary: false,
			lines: ["line 1", "line 2", "line 3"],
			truncated: true,
		});
	});

	it("returns every line when maxLines is negative", async () => {
		const result = await previewFile(join(root, "ten.txt"), -1);
		assert.equal(result.binary, false);
		assert.equal(result.binary ? 0 : result.lines.length, 10);
	});

	it("reports an empty file", async () => {
		assert.deepEqual(await previewFile(join(root, "empty.txt"), 3), {
			binary: true,
			placeholderText: PLACEHOLDER_EMPTY,
		});
	});

	it("reports a binary file instead of partial content", async () => {
		assert.deepEqual(await previewFile(join(root, "image.bin"), 3), {
			binary: true,
			placeholderText: PLACEHOLDER_BINARY,
		});
	});

	it("reports a missing file as unreadable", async () => {
		assert.deepEqual(await previewFile(join(root, "missing.txt"), 3), {
			binary: true,
			placeholderText: PLACEHOLDER_UNREADABLE,
		});
	});

	it("reports a directory as unreadable", async () => {
		assert.deepEqual(await previewFile(root, 3), { binary: true, placeholderText: PLACEHOLDER_UNREADABLE });
	});

	it("reports a file without read permission as unreadable", async () => {
		const operations: PreviewOperations = {
			readPrefix: async () => {
				throw Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
			},
		};
		assert.deepEqual(await previewFile(join(root, "locked.txt"), 3, operations), {
			binary: true,
			placeholderText: PLACEHOLDER_UNREADABLE,
		});
	});

	it("ignores a NUL byte past the first 1024 bytes", async () => {
		const wide = join(root, "wide.txt");
		await writeFile(wide, Buffer.concat([Buffer.from("x".repeat(1030)), Buffer.from([0x00])]));
		assert.deepEqual(await previewFile(wide, 3), {
			binary: false,
			lines: ["x".repeat(PREVIEW_BYTES)],
			truncated: false,
		});
	});

	it("looks only at the first 1024 bytes a custom reader returns", async () => {
		const operations: PreviewOperations = {
			readPrefix: async () => Buffer.concat([Buffer.from(`${"y".repeat(1023)}\n`), Buffer.from([0x00])]),
		};
		assert.deepEqual(await previewFile("/remote/file", 3, operations), {
			binary: false,
			lines: ["y".repeat(1023)],
			truncated: false,
		});
	});

	it("reads only the first bytes", async () => {
		const requested: number[] = [];
		const operations: PreviewOperations = {
			readPrefix: async (_path, length) => {
				requested.push(length);
				return Buffer.from("a\nb\n");
			},
		};
		assert.deepEqual(await previewFile("/remote/file", 20, operations), {
			binary: false,
			lines: ["a", "b"],
			truncated: false,
		});
		assert.deepEqual(requested, [PREVIEW_BYTES]);
	});

	it("rejects when the read channel itself fails", async () => {
		const operations: PreviewOperations = {
			readPrefix: async () => {
				throw new Error("connection closed");
			},
		};
		await assert.rejects(previewFile("/remote/file", 20, operations), { message: "connection closed" });
	});
});

describe("splitPreviewLines", () => {
	it("splits on every line ending and drops blank lines", () => {
		assert.deepEqual(splitPreviewLines(Buffer.from("a\r\n\rb\nc"), 10), {
			lines: ["a", "b", "c"],
			truncated: false,
		});
	});

	it("counts only non-empty lines against the limit", () => {
		assert.deepEqual(splitPreviewLines(Buffer.from("a\n\nb\n\nc\n"), 3), {
			lines: ["a", "b", "c"],
			truncated: false,
		});
		assert.deepEqual(splitPreviewLines(Buffer.from("a\n\nb\n\nc\nd\n"), 3), {
			lines: ["a", "b", "c"],
			truncated: true,
		});
	});

	it("drops an incomplete multi-byte character at the end of the window", () => {
		const bytes = Buffer.concat([Buffer.from("ok "), Buffer.from("é").subarray(0, 1)]);
		assert.deepEqual(splitPreviewLines(bytes, 10), { lines: ["ok "], truncated: false });
	});
});
