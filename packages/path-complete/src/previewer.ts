/**
 * @file 文件内容预览
 *
 * 读取选中文件开头的有限字节作为补全项的文档：
 * - 最多读取 1024 字节，按行拆分并限制行数
 * - 空文件、含 NUL 字节的二进制文件和不可读文件返回占位文本
 * - 可插拔的读取操作（PreviewOperations），支持远程文件系统
 *
 * 文件系统错误（带 errno 代码）被吸收为占位文本；
 * 其他错误说明读取通道本身出了问题，会继续向上抛出。
 */

import { open } from "node:fs/promises";
import { StringDecoder } from "node:string_decoder";
import { errorCode } from "./utils.js";

/** 预览读取的最大字节数 */
export const PREVIEW_BYTES = 1024;

/** 文档中默认显示的最大行数 */
export const DEFAULT_PREVIEW_LINES = 20;

export const PLACEHOLDER_UNREADABLE = "cannot read this file";
export const PLACEHOLDER_EMPTY = "empty file";
export const PLACEHOLDER_BINARY = "binary file";

/** 预览结果：二进制占位文本或文本行 */
export type PreviewResult =
	| { binary: true; placeholderText: string }
	| { binary: false; lines: string[]; truncated: boolean };

/**
 * 预览的可插拔操作接口。
 * 可通过覆写此接口将文件读取委托给远程系统（如 SSH）。
 */
export interface PreviewOperations {
	/** 读取文件开头至多 length 个字节 */
	readPrefix: (absolutePath: string, length: number) => Promise<Buffer>;
}

async function readPrefix(absolutePath: string, length: number): Promise<Buffer> {
	const handle = await open(absolutePath, "r");
	try {
		const buffer = Buffer.alloc(length);
		const { bytesRead } = await handle.read(buffer, 0, length, 0);
		return buffer.subarray(0, bytesRead);
	} finally {
		await handle.close();
	}
}

export const defaultPreviewOperations: PreviewOperations = {
	readPrefix,
};

/** 将已读取的字节拆分为非空行，空行不计入行数；行数为负数时不限制 */
export function splitPreviewLines(bytes: Buffer, maxLines: number): { lines: string[]; truncated: boolean } {
	// StringDecoder holds back a multi-byte sequence cut off by the read window
	const text = new StringDecoder("utf8").write(bytes);
	const lines = text.split(/[\r\n]+/).filter((line) => line !== "");
	if (maxLines < 0 || lines.length <= maxLines) {
		return { lines, truncated: false };
	}
	return { lines: lines.slice(0, maxLines), truncated: true };
}

/**
 * 预览文件开头的内容。
 *
 * @param absolutePath - 文件的绝对路径
 * @param maxLines - 最多保留的行数，小于 0 表示不限制
 */
export async function previewFile(
	absolutePath: string,
	maxLines: number,
	operations: PreviewOperations = defaultPreviewOperations,
): Promise<PreviewResult> {
	let bytes: Buffer;
	try {
		bytes = await operations.readPrefix(absolutePath, PREVIEW_BYTES);
	} catch (error) {
		if (errorCode(error) !== undefined) {
			return { binary: true, placeholderText: PLACEHOLDER_UNREADABLE };
		}
		throw error;
	}

	if (bytes.length === 0) {
		return { binary: true, placeholderText: PLACEHOLDER_EMPTY };
	}
	if (bytes.subarray(0, PREVIEW_BYTES).includes(0)) {
		return { binary: true, placeholderText: PLACEHOLDER_BINARY };
	}

	const { lines, truncated } = splitPreviewLines(bytes.subarray(0, PREVIEW_BYTES), maxLines);
	return { binary: false, lines, truncated };
}
