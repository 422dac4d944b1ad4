/**
 * @file 文件类型识别与文档格式化
 *
 * 根据预览内容和文件名判断文件类型，用于生成带语法高亮的 Markdown 文档：
 * 1. shebang 行的解释器（#!/usr/bin/env python3 → python）
 * 2. 常见的特殊文件名（Makefile、Dockerfile）
 * 3. 文件扩展名
 *
 * 映射表保存在包内的 data/filetypes.json 中，首次使用时加载。
 */

import { readFileSync } from "node:fs";
import { basename, dirname, extname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { PreviewResult } from "./previewer.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const filetypeTableSchema = Type.Object({
	interpreters: Type.Record(Type.String(), Type.String()),
	filenames: Type.Record(Type.String(), Type.String()),
	extensions: Type.Record(Type.String(), Type.String()),
});

/** 文件类型映射表 */
export type FiletypeTable = Static<typeof filetypeTableSchema>;

/** 文档内容格式 */
export type MarkupKind = "plaintext" | "markdown";

/** 补全项的文档 */
export interface Documentation {
	kind: MarkupKind;
	value: string;
}

let cachedTable: FiletypeTable | undefined;

/** 映射表文件路径（src/ 和 dist/ 都与 data/ 同级） */
export function getFiletypeTablePath(): string {
	return join(__dirname, "..", "data", "filetypes.json");
}

/** 加载包内的文件类型映射表 */
export function loadFiletypeTable(): FiletypeTable {
	if (cachedTable) {
		return cachedTable;
	}
	const tablePath = getFiletypeTablePath();
	const parsed: unknown = JSON.parse(readFileSync(tablePath, "utf-8"));
	if (!Value.Check(filetypeTableSchema, parsed)) {
		const first = Value.Errors(filetypeTableSchema, parsed).First();
		throw new Error(`Invalid filetype table ${tablePath}: ${first?.path ?? ""} ${first?.message ?? ""}`.trim());
	}
	cachedTable = parsed;
	return parsed;
}

/** 从 shebang 行提取解释器名称（去掉版本号），如 "#!/usr/bin/env -S python3.12 -u" → "python" */
export function shebangInterpreter(firstLine: string): string | undefined {
	if (!firstLine.startsWith("#!")) {
		return undefined;
	}
	const words = firstLine.slice(2).trim().split(/\s+/);
	let program = basename(words[0] ?? "");
	if (program === "env") {
		program = basename(words.slice(1).find((word) => !word.startsWith("-")) ?? "");
	}
	const withoutVersion = program.replace(/[\d.]+$/, "");
	return withoutVersion === "" ? undefined : withoutVersion;
}

/**
 * 判断文件类型。
 * 依次尝试 shebang、完整文件名和扩展名，无法识别时返回 undefined。
 */
export function detectFiletype(
	filePath: string,
	lines: readonly string[],
	table: FiletypeTable = loadFiletypeTable(),
): string | undefined {
	const interpreter = shebangInterpreter(lines[0] ?? "");
	if (interpreter !== undefined && table.interpreters[interpreter] !== undefined) {
		return table.interpreters[interpreter];
	}

	const name = basename(filePath);
	if (table.filenames[name] !== undefined) {
		return table.filenames[name];
	}

	const extension = extname(name).slice(1).toLowerCase();
	return extension === "" ? undefined : table.extensions[extension];
}

/**
 * 将预览结果格式化为补全项文档。
 * 识别出文件类型时使用 Markdown 代码块，否则使用纯文本。
 */
export function formatDocumentation(filePath: string, preview: PreviewResult, table?: FiletypeTable): Documentation {
	if (preview.binary) {
		return { kind: "plaintext", value: preview.placeholderText };
	}

	const filetype = detectFiletype(filePath, preview.lines, table);
	if (filetype === undefined) {
		return { kind: "plaintext", value: preview.lines.join("\n") };
	}
	return { kind: "markdown", value: [`\`\`\`${filetype}`, ...preview.lines, "```"].join("\n") };
}
