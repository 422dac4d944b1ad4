/**
 * 命令行主流程
 *
 * 解析参数，对给定文本执行一次补全并打印结果：
 * 第一行是解析出的目录，之后每行一个候选项（目录以蓝色显示）。
 * 使用 --preview 时在文件候选项下方缩进打印其开头内容。
 */

import { Chalk } from "chalk";
import { parseArgs, USAGE } from "./cli/args.js";
import { createConsoleLogger, silentLogger } from "./log.js";
import type { CompletionRequest } from "./options.js";
import { PathCompletionSource } from "./source.js";
import { errorMessage } from "./utils.js";

/** 命令行输出通道 */
export interface MainIO {
	print: (line: string) => void;
	printError: (line: string) => void;
	/** 是否输出 ANSI 颜色 */
	color: boolean;
}

const defaultIO: MainIO = {
	print: (line) => console.log(line),
	printError: (line) => console.error(line),
	color: process.stdout.isTTY === true,
};

/** 根据文本推算补全词的起始字节列：最后一段不含路径分隔符等字符的文本之前 */
export function inferOffset(line: string): number {
	const word = line.match(/[^/\\:*?<>'"`|]*$/)?.[0] ?? "";
	return Buffer.byteLength(line, "utf8") - Buffer.byteLength(word, "utf8") + 1;
}

/**
 * 命令行入口。
 *
 * @param argv - 不含 node 和脚本路径的参数
 * @returns 进程退出码
 */
export async function main(argv: readonly string[], io: MainIO = defaultIO): Promise<number> {
	const parsed = parseArgs(argv);
	if (!parsed.ok) {
		io.printError(parsed.error);
		io.printError(USAGE);
		return 1;
	}
	const { args } = parsed;
	if (args.help) {
		io.print(USAGE);
		return 0;
	}

	const chalk = new Chalk({ level: io.color ? 1 : 0 });
	const cwd = args.cwd ?? process.cwd();
	const source = new PathCompletionSource({ logger: args.debug ? createConsoleLogger() : silentLogger });
	const request: CompletionRequest = {
		context: { lineBeforeCursor: args.line, offset: args.offset ?? inferOffset(args.line) },
		option: {
			trailingSlash: args.trailingSlash,
			labelTrailingSlash: args.labelTrailingSlash,
			showHiddenFilesByDefault: args.hidden,
			getCwd: () => cwd,
		},
	};

	try {
		const resolution = source.locate(request);
		if (!resolution) {
			io.printError("No directory could be resolved from the text");
			return 1;
		}
		io.print(chalk.bold(resolution.directory));

		const candidates = await source.complete(request);
		for (const candidate of candidates) {
			io.print(candidate.kind === "directory" ? chalk.blue(candidate.displayLabel) : candidate.displayLabel);
			if (!args.preview) continue;
			const resolved = await source.resolve(candidate);
			if (resolved.documentation) {
				for (const docLine of resolved.documentation.value.split("\n")) {
					io.print(chalk.dim(`    ${docLine}`));
				}
			}
		}
		return 0;
	} catch (error) {
		io.printError(`Error: ${errorMessage(error)}`);
		return 1;
	}
}
