/**
 * @file 目录扫描
 *
 * 列出已解析目录中的条目并生成补全候选项：
 * 1. 按配置跳过隐藏文件（以 . 开头）
 * 2. 逐个 stat 条目，符号链接失效时回退到 lstat
 * 3. 区分文件和目录，目录的插入文本带尾部斜杠
 * 4. 可插拔的操作接口（ScanOperations），支持远程或模拟文件系统
 *
 * 所有 I/O 都通过 fs/promises 在 libuv 线程池中执行，不阻塞事件循环。
 * 每个候选项都是独立的普通对象，不共享 fs.Stats 实例。
 */

import type { Stats } from "node:fs";
import { lstat as fsLstat, opendir as fsOpendir, stat as fsStat } from "node:fs/promises";
import { join } from "node:path";
import { errorCode } from "./utils.js";

/** 文件系统条目类型（与 libuv 的类型名一致） */
export type EntryType = "file" | "directory" | "link" | "fifo" | "socket" | "char" | "block" | "unknown";

/** 候选项种类 */
export type CandidateKind = "file" | "directory";

/** 可跨越异步边界传递的 stat 快照 */
export interface EntryStat {
	type: EntryType;
	size: number;
	mtimeMs: number;
	mode: number;
}

/** 补全候选项 */
export interface CandidateEntry {
	/** 原始条目名称（不含路径） */
	name: string;
	kind: CandidateKind;
	/** 显示标签，目录按配置带尾部斜杠 */
	displayLabel: string;
	/** 过滤用文本，始终为条目名称 */
	filterText: string;
	/** 插入文本，目录始终带尾部斜杠 */
	insertText: string;
	/** 不带尾部斜杠的单词（trailingSlash 关闭时用于目录的单词边界匹配） */
	word?: string;
	absolutePath: string;
	/** 目标的 stat 信息；符号链接目标无法 stat 时缺失 */
	stat?: EntryStat;
	/** 仅当目标无法 stat 时附带链接本身的 lstat 信息 */
	lstat?: EntryStat;
}

/** 扫描时使用的候选项格式选项 */
export interface ScanOptions {
	trailingSlash: boolean;
	labelTrailingSlash: boolean;
}

/** 目录条目的最小接口（fs.Dirent 满足此接口） */
export interface ScanDirent {
	name: string;
	isSymbolicLink(): boolean;
}

/**
 * 扫描的可插拔操作接口。
 * 可通过覆写此接口将目录扫描委托给远程系统（如 SSH）或测试替身。
 */
export interface ScanOperations {
	/** 打开目录，按文件系统顺序迭代其条目；失败时抛出异常 */
	opendir: (absolutePath: string) => Promise<AsyncIterable<ScanDirent>>;
	/** 跟随符号链接获取状态 */
	stat: (absolutePath: string) => Promise<Stats>;
	/** 获取符号链接本身的状态 */
	lstat: (absolutePath: string) => Promise<Stats>;
}

export const defaultScanOperations: ScanOperations = {
	opendir: (path) => fsOpendir(path),
	stat: (path) => fsStat(path),
	lstat: (path) => fsLstat(path),
};

/** 将 fs.Stats 转换为可序列化的快照 */
export function toEntryStat(stats: Stats): EntryStat {
	return {
		type: entryTypeOf(stats),
		size: stats.size,
		mtimeMs: stats.mtimeMs,
		mode: stats.mode,
	};
}

function entryTypeOf(stats: Stats): EntryType {
	if (stats.isFile()) return "file";
	if (stats.isDirectory()) return "directory";
	if (stats.isSymbolicLink()) return "link";
	if (stats.isFIFO()) return "fifo";
	if (stats.isSocket()) return "socket";
	if (stats.isCharacterDevice()) return "char";
	if (stats.isBlockDevice()) return "block";
	return "unknown";
}

/** 目标不存在或链接成环：符号链接已失效 */
const BROKEN_LINK_CODES = new Set(["ENOENT", "ENOTDIR", "ELOOP"]);

/** 根据条目名称、类型和选项构建候选项 */
export function buildCandidate(
	name: string,
	absolutePath: string,
	kind: CandidateKind,
	options: ScanOptions,
	stats: { stat?: EntryStat; lstat?: EntryStat },
): CandidateEntry {
	const candidate: CandidateEntry = {
		name,
		kind,
		displayLabel: name,
		filterText: name,
		insertText: name,
		absolutePath,
		...stats,
	};
	if (kind === "directory") {
		candidate.displayLabel = options.labelTrailingSlash ? `${name}/` : name;
		candidate.insertText = `${name}/`;
		if (!options.trailingSlash) {
			candidate.word = name;
		}
	}
	return candidate;
}

/**
 * 扫描目录并返回候选项列表（文件系统迭代顺序，不排序）。
 * 目录无法打开时 Promise 被拒绝；单个条目的错误不会中断扫描。
 *
 * @param dirname - 已解析的绝对目录
 * @param includeHidden - 是否包含以 . 开头的条目
 */
export async function scanDirectory(
	dirname: string,
	includeHidden: boolean,
	options: ScanOptions,
	operations: ScanOperations = defaultScanOperations,
): Promise<CandidateEntry[]> {
	const entries = await operations.opendir(dirname);
	const candidates: CandidateEntry[] = [];

	for await (const entry of entries) {
		if (!includeHidden && entry.name.startsWith(".")) {
			continue;
		}

		const absolutePath = join(dirname, entry.name);
		let stat: EntryStat;
		try {
			stat = toEntryStat(await operations.stat(absolutePath));
		} catch (statError) {
			if (!entry.isSymbolicLink()) {
				// Vanished between listing and stat, or not permitted
				continue;
			}
			let lstat: EntryStat;
			try {
				lstat = toEntryStat(await operations.lstat(absolutePath));
			} catch {
				continue;
			}
			const code = errorCode(statError);
			if (code !== undefined && BROKEN_LINK_CODES.has(code)) {
				continue;
			}
			// Target exists but cannot be inspected (e.g. EACCES): offer it as a plain file
			candidates.push(buildCandidate(entry.name, absolutePath, "file", options, { lstat }));
			continue;
		}

		const kind: CandidateKind = stat.type === "directory" ? "directory" : "file";
		candidates.push(buildCandidate(entry.name, absolutePath, kind, options, { stat }));
	}

	return candidates;
}
