/**
 * @file 通用工具函数
 */

/** 读取 Node.js 文件系统错误的 errno 代码（如 ENOENT），非文件系统错误返回 undefined */
export function errorCode(error: unknown): string | undefined {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}

/** 将未知错误转换为可读消息 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** 生成 HH:MM:SS 格式的时间戳 */
export function timestamp(date: Date = new Date()): string {
	const hh = String(date.getHours()).padStart(2, "0");
	const mm = String(date.getMinutes()).padStart(2, "0");
	const ss = String(date.getSeconds()).padStart(2, "0");
	return `${hh}:${mm}:${ss}`;
}
