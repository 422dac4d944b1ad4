/**
 * @file 诊断日志
 *
 * 补全源通过注入的 DiagnosticLogger 输出调试信息，默认不输出任何内容。
 * 提供三种实现：
 * - silentLogger：丢弃所有消息
 * - createFileLogger：追加到日志文件（带 [HH:MM:SS] 时间戳）
 * - createConsoleLogger：以暗色输出到 stderr（使用 chalk 库）
 *
 * loggerFromEnv 在设置了 ASYNC_PATH_COMPLETE_DEBUG=1 时返回文件日志。
 */

import { appendFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import chalk from "chalk";
import { timestamp } from "./utils.js";

/** 诊断日志接口 */
export interface DiagnosticLogger {
	log(message: string): void;
}

/** 启用文件日志的环境变量 */
export const DEBUG_ENV_VAR = "ASYNC_PATH_COMPLETE_DEBUG";

/** 丢弃所有消息的日志实现 */
export const silentLogger: DiagnosticLogger = {
	log: () => {},
};

/** 默认的调试日志文件路径 */
export function getDefaultLogPath(): string {
	return join(tmpdir(), "async-path-complete-debug.log");
}

/**
 * 创建写入文件的日志。
 * 创建时清空文件并写入起始标记，之后每条消息追加一行。
 */
export function createFileLogger(logPath: string = getDefaultLogPath()): DiagnosticLogger {
	const started = new Date();
	writeFileSync(logPath, `=== async-path-complete debug log started at ${started.toISOString()} ===\n`);
	return {
		log: (message) => {
			try {
				appendFileSync(logPath, `[${timestamp()}] ${message}\n`);
			} catch {
				// Ignore logging errors
			}
		},
	};
}

/** 创建输出到 stderr 的日志 */
export function createConsoleLogger(stream: NodeJS.WritableStream = process.stderr): DiagnosticLogger {
	return {
		log: (message) => {
			stream.write(`${chalk.dim(`[${timestamp()}]`)} ${chalk.gray(message)}\n`);
		},
	};
}

/** 根据环境变量选择日志实现 */
export function loggerFromEnv(
	env: Record<string, string | undefined> = process.env,
	logPath: string = getDefaultLogPath(),
): DiagnosticLogger {
	return env[DEBUG_ENV_VAR] === "1" ? createFileLogger(logPath) : silentLogger;
}
