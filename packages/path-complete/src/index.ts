/**
 * @file 包入口文件
 *
 * 从各个模块中重新导出公共接口、类型和函数：
 * - 目录解析（resolveDirname、规则表和误判守卫）
 * - 目录扫描与文件预览
 * - 补全源（PathCompletionSource）及其配置
 * - 诊断日志
 */

// 文件类型与文档格式化
export {
	type Documentation,
	detectFiletype,
	type FiletypeTable,
	formatDocumentation,
	loadFiletypeTable,
	type MarkupKind,
	shebangInterpreter,
} from "./filetype.js";
// 诊断日志
export {
	createConsoleLogger,
	createFileLogger,
	DEBUG_ENV_VAR,
	type DiagnosticLogger,
	loggerFromEnv,
	silentLogger,
} from "./log.js";
// 配置
export {
	type CompletionRequest,
	DEFAULT_OPTIONS,
	type EditorMode,
	type PathCompletionOptions,
	validateOptions,
} from "./options.js";
// 目录解析
export {
	type CursorContext,
	canonicalize,
	DEFAULT_LOOKALIKE_GUARDS,
	findPathStart,
	getProcessEnvironment,
	isSlashComment,
	type LookalikeGuard,
	matchPath,
	type PathMatch,
	RESOLVE_RULES,
	type Resolution,
	type ResolveOptions,
	type ResolveRule,
	type ResolverEnvironment,
	type ResolverPlatform,
	type ResolveScope,
	resolveDirectory,
	resolveDirname,
} from "./path-resolver.js";
// 文件预览
export {
	DEFAULT_PREVIEW_LINES,
	defaultPreviewOperations,
	PLACEHOLDER_BINARY,
	PLACEHOLDER_EMPTY,
	PLACEHOLDER_UNREADABLE,
	PREVIEW_BYTES,
	type PreviewOperations,
	type PreviewResult,
	previewFile,
	splitPreviewLines,
} from "./previewer.js";
// 目录扫描
export {
	buildCandidate,
	type CandidateEntry,
	type CandidateKind,
	defaultScanOperations,
	type EntryStat,
	type EntryType,
	type ScanDirent,
	type ScanOperations,
	type ScanOptions,
	scanDirectory,
	toEntryStat,
} from "./scanner.js";
// 补全源
export {
	PathCompletionSource,
	type PathCompletionSourceOptions,
	type ResolvedCandidate,
	shouldIncludeHidden,
} from "./source.js";
