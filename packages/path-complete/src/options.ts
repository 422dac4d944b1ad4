/**
 * @file 补全源配置
 *
 * 定义每次请求的配置项、默认值和校验逻辑。
 * 使用 TypeBox Schema 校验合并后的配置，类型错误视为编程错误并立即抛出。
 */

import { dirname } from "node:path";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { CursorContext } from "./path-resolver.js";

/** 编辑模式：cmdline 表示宿主处于命令行编辑模式 */
export type EditorMode = "insert" | "cmdline";

/** 宿主发起的补全请求 */
export interface CompletionRequest {
	context: CursorContext;
	/** 当前缓冲区对应的文件路径，未保存的缓冲区为空 */
	bufferPath?: string;
	mode?: EditorMode;
	/** 本次请求的配置（来自用户设置，未经校验），与默认值合并 */
	option?: Readonly<Record<string, unknown>>;
}

/** 补全源配置 */
export interface PathCompletionOptions {
	/** 为 false 时目录候选项携带不带斜杠的 word，便于单词边界匹配 */
	trailingSlash: boolean;
	/** 目录的显示标签是否带尾部斜杠 */
	labelTrailingSlash: boolean;
	/** 计算相对路径的基准目录 */
	getCwd: (request: CompletionRequest) => string;
	/** 未输入 . 时是否也显示隐藏文件 */
	showHiddenFilesByDefault: boolean;
}

const optionsSchema = Type.Object({
	trailingSlash: Type.Boolean(),
	labelTrailingSlash: Type.Boolean(),
	getCwd: Type.Function([Type.Unknown()], Type.String()),
	showHiddenFilesByDefault: Type.Boolean(),
});

/** 默认基准目录：缓冲区文件所在目录，没有文件时使用进程工作目录 */
function defaultGetCwd(request: CompletionRequest): string {
	return request.bufferPath ? dirname(request.bufferPath) : process.cwd();
}

export const DEFAULT_OPTIONS: PathCompletionOptions = {
	trailingSlash: false,
	labelTrailingSlash: true,
	getCwd: defaultGetCwd,
	showHiddenFilesByDefault: false,
};

/**
 * 将请求配置与默认值合并并校验。
 * 值为 undefined 的配置项使用默认值；未知配置项被忽略。
 *
 * @throws 配置项类型错误时抛出，消息中包含配置项名称
 */
export function validateOptions(option: Readonly<Record<string, unknown>> = {}): PathCompletionOptions {
	const provided = Object.fromEntries(Object.entries(option).filter(([, value]) => value !== undefined));
	const merged: Record<string, unknown> = { ...DEFAULT_OPTIONS, ...provided };

	if (!Value.Check(optionsSchema, merged)) {
		const first = Value.Errors(optionsSchema, merged).First();
		const name = first?.path.replace(/^\//, "") || "option";
		throw new Error(`Invalid path completion option "${name}": ${first?.message ?? "unexpected value"}`);
	}
	return {
		trailingSlash: merged.trailingSlash,
		labelTrailingSlash: merged.labelTrailingSlash,
		getCwd: merged.getCwd,
		showHiddenFilesByDefault: merged.showHiddenFilesByDefault,
	};
}
