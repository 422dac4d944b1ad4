/**
 * @file 光标前文本的目录解析
 *
 * 将光标前的任意文本解析为文件系统中的绝对目录。支持：
 * - 相对路径（./、../、不带前缀的 lua/）
 * - ~ 展开和 $VAR 环境变量展开
 * - Windows 盘符（C:\）
 * - 引号路径和绝对路径
 *
 * 同时排除看起来像路径但并非路径的文本（URL、HTML 结束标签、除法运算、注释）。
 * 解析过程是纯函数：平台、主目录和环境变量都通过 ResolverEnvironment 注入。
 */

import { homedir } from "node:os";
import path from "node:path";

/** 路径名中不允许出现的字符（两个平台相同） */
const INVALID_NAME_CHARS = new Set(["/", "\\", ":", "*", "?", "<", ">", "'", '"', "`", "|"]);

/** 路径段末尾额外不允许的字符 */
const INVALID_SEGMENT_END_CHARS = new Set([" ", ".", "~"]);

/**
 * 相对路径 token 的分隔符，用于从前缀中提取最后一个 token。
 * 名称中的空格同样是分隔符：未加引号的 `My Documents/` 解析为 cwd/Documents，
 * 以引号开头的 `"My Documents/` 才解析为 cwd/My Documents。
 */
const TOKEN_DELIMITERS = new Set([" ", "\t", '"', "'", "`", "=", "(", "[", "{", "<", ">", ",", ";", "|"]);

/** 光标上下文（每次请求不可变） */
export interface CursorContext {
	/** 光标前的整行文本 */
	lineBeforeCursor: string;
	/** 当前补全词的起始列，按 UTF-8 字节计（从 1 开始，与宿主编辑器一致） */
	offset: number;
	/** 当前缓冲区的注释格式，如 "// %s" */
	commentString?: string;
	/** 当前缓冲区的文件类型，空字符串表示无文件类型 */
	filetype?: string;
}

export type ResolverPlatform = "posix" | "win32";

/** 解析器依赖的外部环境 */
export interface ResolverEnvironment {
	platform: ResolverPlatform;
	homedir: string;
	env: Record<string, string | undefined>;
}

/** 路径匹配结果：prefix 包含分隔符本身，dirname 是分隔符之后去掉正在输入的名称的部分 */
export interface PathMatch {
	input: string;
	prefix: string;
	dirname: string;
}

/** 单条规则执行时可用的上下文 */
export interface ResolveScope {
	cwd: string;
	context: CursorContext;
	environment: ResolverEnvironment;
	guards: readonly LookalikeGuard[];
}

/**
 * 解析规则。
 * apply 返回未规范化的目录路径，返回 null 表示规则不适用，继续尝试下一条。
 */
export interface ResolveRule {
	name: string;
	apply(match: PathMatch, scope: ResolveScope): string | null;
}

/**
 * 绝对路径误判守卫。
 * matches 返回 true 表示 prefix 只是看起来像路径（URL、标签、算式等），应放弃解析。
 */
export interface LookalikeGuard {
	name: string;
	matches(prefix: string, context: CursorContext): boolean;
}

/** 获取当前进程的解析环境 */
export function getProcessEnvironment(): ResolverEnvironment {
	return {
		platform: process.platform === "win32" ? "win32" : "posix",
		homedir: homedir(),
		env: process.env,
	};
}

function separatorsFor(platform: ResolverPlatform): Set<string> {
	return platform === "win32" ? new Set(["/", "\\"]) : new Set(["/"]);
}

function isNameChar(ch: string): boolean {
	return !INVALID_NAME_CHARS.has(ch);
}

function isSegmentEndChar(ch: string): boolean {
	return isNameChar(ch) && !INVALID_SEGMENT_END_CHARS.has(ch);
}

/** 当前缓冲区是否使用 / 作为注释标记（// 或 /*） */
export function isSlashComment(context: CursorContext): boolean {
	const commentString = context.commentString ?? "";
	const hasFiletype = (context.filetype ?? "") !== "";
	return hasFiletype && (commentString.includes("/*") || commentString.includes("//"));
}

/**
 * 从右向左查找路径的起始位置。
 *
 * 寻找最左侧的位置 s，使得从 s 开始的文本由若干路径段（分隔符 + 名称，或 ..）
 * 组成，最后是一个分隔符，其后直到行尾都是正在输入的名称。
 * 使用自右向左的动态规划代替回溯正则，避免多个 "." 造成指数级回溯。
 *
 * @returns 起始位置，未找到时返回 -1
 */
export function findPathStart(text: string, platform: ResolverPlatform): number {
	const n = text.length;
	const separators = separatorsFor(platform);
	// `"` and `.` also open a segment; on Windows `..` only counts after a real separator
	const opensSegment = (ch: string) => separators.has(ch) || ch === "." || ch === '"';
	const opensParent = (ch: string) => separators.has(ch) || (platform === "posix" && ch === ".");

	// nameTail[i]: text[i..] consists solely of name characters
	const nameTail = new Array<boolean>(n + 1).fill(false);
	nameTail[n] = true;
	for (let i = n - 1; i >= 0; i -= 1) {
		nameTail[i] = nameTail[i + 1] === true && isNameChar(text[i] ?? "");
	}

	// matchesFrom[p]: a path match can start at p
	const matchesFrom = new Array<boolean>(n + 1).fill(false);
	for (let p = n - 1; p >= 0; p -= 1) {
		const ch = text[p] ?? "";
		if (opensSegment(ch) && nameTail[p + 1]) {
			matchesFrom[p] = true;
			continue;
		}
		if (opensParent(ch) && text.startsWith("..", p + 1) && matchesFrom[p + 3]) {
			matchesFrom[p] = true;
			continue;
		}
		if (!opensSegment(ch)) continue;
		for (let k = p + 1; k < n && isNameChar(text[k] ?? ""); k += 1) {
			if (isSegmentEndChar(text[k] ?? "") && matchesFrom[k + 1]) {
				matchesFrom[p] = true;
				break;
			}
		}
	}

	return matchesFrom.indexOf(true);
}

/** 将前缀按分隔符拆出 prefix/dirname，未匹配时返回 null */
export function matchPath(input: string, platform: ResolverPlatform): PathMatch | null {
	const start = findPathStart(input, platform);
	if (start === -1) {
		return null;
	}
	return {
		input,
		prefix: input.slice(0, start + 1),
		dirname: input.slice(start + 1).replace(/[A-Za-z]*$/, ""),
	};
}

function endsWithSeparator(text: string, platform: ResolverPlatform): boolean {
	return separatorsFor(platform).has(text.slice(-1));
}

/** 取 text 中最后一个分隔符之后的 token */
function lastToken(text: string): string {
	for (let i = text.length - 1; i >= 0; i -= 1) {
		if (TOKEN_DELIMITERS.has(text[i] ?? "")) {
			return text.slice(i + 1);
		}
	}
	return text;
}

/** 默认的误判守卫，按名称可单独替换或扩展 */
export const DEFAULT_LOOKALIKE_GUARDS: readonly LookalikeGuard[] = [
	{ name: "single-letter", matches: (prefix) => /[A-Za-z]\/$/.test(prefix) },
	{ name: "url-scheme", matches: (prefix) => /[A-Za-z]+:\/\/?$/.test(prefix) },
	{ name: "html-closing-tag", matches: (prefix) => /<\/$/.test(prefix) },
	{ name: "arithmetic", matches: (prefix) => /[\d)]\s*\/$/.test(prefix) },
	{
		name: "slash-comment",
		matches: (prefix, context) => /^[\s/]*$/.test(prefix) && isSlashComment(context),
	},
];

/** 按优先级排列的解析规则表，先匹配者生效 */
export const RESOLVE_RULES: readonly ResolveRule[] = [
	{
		name: "parent",
		apply: ({ prefix, dirname }, { cwd, environment }) =>
			/\.\.$/.test(prefix.slice(0, -1)) && endsWithSeparator(prefix, environment.platform)
				? `${cwd}/../${dirname}`
				: null,
	},
	{
		name: "current",
		apply: ({ prefix, dirname }, { cwd, environment }) => {
			const dotSlash = prefix.slice(0, -1).endsWith(".") && endsWithSeparator(prefix, environment.platform);
			return dotSlash || /["']$/.test(prefix) ? `${cwd}/${dirname}` : null;
		},
	},
	{
		name: "home",
		apply: ({ prefix, dirname }, { environment }) =>
			prefix.slice(0, -1).endsWith("~") && endsWithSeparator(prefix, environment.platform)
				? `${environment.homedir}/${dirname}`
				: null,
	},
	{
		name: "env",
		apply: ({ prefix, dirname }, { environment }) => {
			if (!endsWithSeparator(prefix, environment.platform)) return null;
			const name = prefix.slice(0, -1).match(/\$([A-Za-z_][A-Za-z0-9_]*)$/)?.[1];
			const value = name === undefined ? undefined : environment.env[name];
			return value === undefined ? null : `${value}/${dirname}`;
		},
	},
	{
		name: "drive",
		apply: ({ prefix, dirname }, { environment }) => {
			if (environment.platform !== "win32") return null;
			const drive = prefix.match(/([A-Za-z]:)[/\\]$/)?.[1];
			return drive === undefined ? null : `${drive}/${dirname}`;
		},
	},
	{
		// ".lo" at the start of a word: the user is typing a hidden name in cwd
		name: "hidden-name",
		apply: ({ input, prefix }, { cwd }) => {
			if (!prefix.endsWith(".")) return null;
			const before = prefix.slice(-2, -1);
			if (before !== "" && !TOKEN_DELIMITERS.has(before)) return null;
			// ".5", ".." and a dot followed by spaces are numbers and operators, not names
			const name = input.slice(prefix.length);
			return name === "" || /^[\d.]/.test(name) || /\s/.test(name) ? null : cwd;
		},
	},
	{
		name: "relative",
		apply: ({ prefix, dirname }, { cwd, environment }) => {
			if (!endsWithSeparator(prefix, environment.platform)) return null;
			const token = lastToken(prefix.slice(0, -1));
			if (token === "" || /^[/\\~$]/.test(token)) return null;
			// scheme ("http:"), bare number or closing paren: a URL or a division, not a directory
			if (/^[A-Za-z][A-Za-z0-9+.-]*:/.test(token) || /^\d+(\.\d+)?$/.test(token) || token.endsWith(")")) {
				return null;
			}
			return `${cwd}/${token}/${dirname}`;
		},
	},
	{
		name: "absolute",
		apply: ({ prefix, dirname }, { context, guards }) => {
			if (!prefix.endsWith("/")) return null;
			return guards.some((guard) => guard.matches(prefix, context)) ? null : `/${dirname}`;
		},
	},
];

/**
 * 规范化路径：解析 . 和 ..，Windows 下统一分隔符，去掉多余的尾部分隔符。
 * 相对路径基于 cwd 补全为绝对路径。
 */
export function canonicalize(candidate: string, cwd: string, platform: ResolverPlatform): string {
	const api = platform === "win32" ? path.win32 : path.posix;
	const absolute = api.isAbsolute(candidate) ? candidate : api.join(cwd, candidate);
	const normalized = api.normalize(absolute);
	const { root } = api.parse(normalized);
	if (normalized.length <= root.length) {
		return normalized;
	}
	return normalized.replace(platform === "win32" ? /[\\/]+$/ : /\/+$/, "");
}

/** resolveDirectory 的可选参数 */
export interface ResolveOptions {
	environment?: ResolverEnvironment;
	guards?: readonly LookalikeGuard[];
	rules?: readonly ResolveRule[];
}

/** 解析结果及给出结果的规则名称（"no-match"、"dot"、"dot-relative" 为规则表之前的特殊分支） */
export interface Resolution {
	directory: string;
	rule: string;
}

/**
 * 将光标前的文本解析为绝对目录，并记录命中的规则。
 *
 * @param context - 光标上下文
 * @param cwd - 相对路径的基准目录
 * @returns 解析结果，无法解析时返回 null
 */
export function resolveDirectory(context: CursorContext, cwd: string, options: ResolveOptions = {}): Resolution | null {
	const environment = options.environment ?? getProcessEnvironment();
	const { platform } = environment;
	const input = context.lineBeforeCursor;
	const match = matchPath(input, platform);
	const done = (candidate: string, rule: string): Resolution => ({
		directory: canonicalize(candidate, cwd, platform),
		rule,
	});

	if (!match) {
		// "lua/x:" and the like: everything up to the last separator, relative to cwd
		const separators = separatorsFor(platform);
		for (let i = input.length - 1; i >= 0; i -= 1) {
			if (separators.has(input[i] ?? "")) {
				return done(`${cwd}/${input.slice(0, i + 1)}`, "no-match");
			}
		}
		// A bare word such as "REA" lists cwd
		return done(cwd, "no-match");
	}

	if (input === ".") {
		return done(cwd, "dot");
	}

	// ".git/", "../src/": the whole input is the relative directory
	if (input.startsWith(".") && endsWithSeparator(input, platform)) {
		return done(`${cwd}/${input.slice(0, -1)}`, "dot-relative");
	}

	const scope: ResolveScope = {
		cwd,
		context,
		environment,
		guards: options.guards ?? DEFAULT_LOOKALIKE_GUARDS,
	};
	for (const rule of options.rules ?? RESOLVE_RULES) {
		const resolved = rule.apply(match, scope);
		if (resolved !== null) {
			return done(resolved, rule.name);
		}
	}
	return null;
}

/** 将光标前的文本解析为绝对目录，无法解析时返回 null */
export function resolveDirname(context: CursorContext, cwd: string, options: ResolveOptions = {}): string | null {
	return resolveDirectory(context, cwd, options)?.directory ?? null;
}
