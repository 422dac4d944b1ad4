/**
 * @file 路径补全源
 *
 * 负责单次补全请求的完整流程：
 * 1. 校验并合并配置
 * 2. 计算基准目录（命令行模式下使用进程工作目录）
 * 3. 将光标前文本解析为目录
 * 4. 决定是否显示隐藏文件，扫描目录并返回候选项
 *
 * 另外在宿主请求文档时预览选中文件的开头内容。
 * 文件系统层面的问题（目录不存在、链接失效、文件不可读）都不会作为错误抛给调用方。
 */

import { type Documentation, type FiletypeTable, formatDocumentation } from "./filetype.js";
import { type DiagnosticLogger, silentLogger } from "./log.js";
import { type CompletionRequest, type PathCompletionOptions, validateOptions } from "./options.js";
import {
	type CursorContext,
	getProcessEnvironment,
	type LookalikeGuard,
	type Resolution,
	type ResolverEnvironment,
	resolveDirectory,
} from "./path-resolver.js";
import {
	DEFAULT_PREVIEW_LINES,
	defaultPreviewOperations,
	type PreviewOperations,
	type PreviewResult,
	previewFile,
} from "./previewer.js";
import { type CandidateEntry, defaultScanOperations, type ScanOperations, scanDirectory } from "./scanner.js";
import { errorMessage } from "./utils.js";

/** 带文档的候选项 */
export type ResolvedCandidate = CandidateEntry & { documentation?: Documentation };

/** PathCompletionSource 的构造选项 */
export interface PathCompletionSourceOptions {
	/** 诊断日志，默认不输出 */
	logger?: DiagnosticLogger;
	/** 平台、主目录和环境变量，默认取自当前进程 */
	environment?: ResolverEnvironment;
	/** 绝对路径误判守卫，默认使用 DEFAULT_LOOKALIKE_GUARDS */
	guards?: readonly LookalikeGuard[];
	scanOperations?: ScanOperations;
	previewOperations?: PreviewOperations;
	/** 文档预览的最大行数，小于 0 表示不限制 */
	maxPreviewLines?: number;
	/** 命令行模式下的基准目录，默认 process.cwd() */
	getProcessCwd?: () => string;
	/** 文件类型映射表，默认加载包内的 data/filetypes.json */
	filetypes?: FiletypeTable;
}

const DOT = 0x2e;

/**
 * 判断本次请求是否显示隐藏文件：
 * 默认开启，或 offset 处的字节是 "."（如 ".lo"），或其前一个字节是 "."（如 "." 或 "lua/."）。
 * offset 是 UTF-8 字节列，因此按字节而不是按字符比较。
 */
export function shouldIncludeHidden(context: CursorContext, showHiddenFilesByDefault: boolean): boolean {
	const { lineBeforeCursor, offset } = context;
	const bytes = Buffer.from(lineBeforeCursor, "utf8");
	return (
		showHiddenFilesByDefault ||
		(offset >= 1 && bytes[offset - 1] === DOT) ||
		(offset >= 2 && bytes[offset - 2] === DOT)
	);
}

/**
 * 文件路径补全源。
 * 实例不保存任何请求状态，可以同时处理多个请求；
 * 过期请求的结果由调用方自行丢弃。
 */
export class PathCompletionSource {
	private logger: DiagnosticLogger;
	private environment: ResolverEnvironment;
	private guards: readonly LookalikeGuard[] | undefined;
	private scanOperations: ScanOperations;
	private previewOperations: PreviewOperations;
	private maxPreviewLines: number;
	private getProcessCwd: () => string;
	private filetypes: FiletypeTable | undefined;

	constructor(options: PathCompletionSourceOptions = {}) {
		this.logger = options.logger ?? silentLogger;
		this.environment = options.environment ?? getProcessEnvironment();
		this.guards = options.guards;
		this.scanOperations = options.scanOperations ?? defaultScanOperations;
		this.previewOperations = options.previewOperations ?? defaultPreviewOperations;
		this.maxPreviewLines = options.maxPreviewLines ?? DEFAULT_PREVIEW_LINES;
		this.getProcessCwd = options.getProcessCwd ?? (() => process.cwd());
		this.filetypes = options.filetypes;
	}

	/** 触发补全的字符 */
	getTriggerCharacters(): string[] {
		return this.environment.platform === "win32" ? ["/", ".", "\\"] : ["/", "."];
	}

	/**
	 * 正在输入的名称的匹配模式。
	 * 不包含 /，因为 / 是触发字符：输入 "lua/" 时补全词从 / 之后开始。
	 */
	getKeywordPattern(): RegExp {
		return /[^/\\:*?<>'"`|]*/;
	}

	/** 计算本次请求的基准目录 */
	getCwd(request: CompletionRequest, option: PathCompletionOptions): string {
		if (request.mode === "cmdline") {
			return this.getProcessCwd();
		}
		return option.getCwd(request);
	}

	/** 解析请求对应的目录，无法解析时返回 null */
	locate(request: CompletionRequest): Resolution | null {
		return this.locateWith(request, validateOptions(request.option));
	}

	private locateWith(request: CompletionRequest, option: PathCompletionOptions): Resolution | null {
		const cwd = this.getCwd(request, option);
		return resolveDirectory(request.context, cwd, { environment: this.environment, guards: this.guards });
	}

	/**
	 * 获取补全候选项。
	 * 无法解析目录或目录无法读取时返回空数组；配置错误时 Promise 被拒绝。
	 */
	async complete(request: CompletionRequest): Promise<CandidateEntry[]> {
		const option = validateOptions(request.option);
		const { context } = request;
		this.logger.log(`complete called with input: '${context.lineBeforeCursor}', offset: ${context.offset}`);

		const resolution = this.locateWith(request, option);
		if (!resolution) {
			this.logger.log("no directory resolved");
			return [];
		}
		this.logger.log(`resolved '${resolution.directory}' by rule '${resolution.rule}'`);

		const includeHidden = shouldIncludeHidden(context, option.showHiddenFilesByDefault);
		try {
			const candidates = await scanDirectory(resolution.directory, includeHidden, option, this.scanOperations);
			this.logger.log(`scan returned ${candidates.length} candidates (include_hidden: ${includeHidden})`);
			return candidates;
		} catch (error) {
			this.logger.log(`scan failed: ${errorMessage(error)}`);
			return [];
		}
	}

	/**
	 * 为候选项补充文档。
	 * 只有指向普通文件的候选项会读取内容，其他候选项原样返回。
	 * 读取通道本身失败时 Promise 被拒绝。
	 */
	async resolve(candidate: CandidateEntry): Promise<ResolvedCandidate> {
		if (candidate.stat?.type !== "file") {
			return candidate;
		}

		let preview: PreviewResult;
		try {
			preview = await previewFile(candidate.absolutePath, this.maxPreviewLines, this.previewOperations);
		} catch (error) {
			throw new Error(`Failed to read preview of ${candidate.absolutePath}: ${errorMessage(error)}`, {
				cause: error,
			});
		}
		return { ...candidate, documentation: formatDocumentation(candidate.absolutePath, preview, this.filetypes) };
	}
}
