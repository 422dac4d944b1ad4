/**
 * 命令行参数解析
 *
 * 将 argv 解析为 CliArgs；遇到未知选项或缺少参数值时返回错误消息而不是退出进程，
 * 由调用方决定如何输出。
 */

/** 解析后的命令行参数 */
export interface CliArgs {
	/** 光标前的文本 */
	line: string;
	/** 相对路径的基准目录 */
	cwd?: string;
	/** 补全词的起始列（从 1 开始），缺省时根据 line 推算 */
	offset?: number;
	hidden: boolean;
	trailingSlash: boolean;
	labelTrailingSlash: boolean;
	preview: boolean;
	debug: boolean;
	help: boolean;
}

export type ParseResult = { ok: true; args: CliArgs } | { ok: false; error: string };

export const USAGE = `Usage: async-path-complete [options] <text-before-cursor>

Resolves the directory referenced by the text and lists its entries.

Options:
  --cwd <dir>         Base directory for relative paths (default: current directory)
  --offset <column>   1-based column where the word being completed starts
  --hidden            Show dot-files even without a leading "."
  --trailing-slash    Keep the trailing slash in the word of directory entries
  --no-label-slash    Do not append "/" to directory labels
  --preview           Print the first lines of each file
  --debug             Print diagnostics to stderr
  -h, --help          Show this help

Examples:
  async-path-complete "../src/"
  async-path-complete --cwd /tmp "see ./"
  async-path-complete --preview "~/.config/"
`;

/** 解析命令行参数（不含 node 和脚本路径） */
export function parseArgs(argv: readonly string[]): ParseResult {
	const args: CliArgs = {
		line: "",
		hidden: false,
		trailingSlash: false,
		labelTrailingSlash: true,
		preview: false,
		debug: false,
		help: false,
	};
	const positional: string[] = [];

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? "";
		if (arg === "--") {
			positional.push(...argv.slice(i + 1));
			break;
		}
		switch (arg) {
			case "-h":
			case "--help":
				args.help = true;
				break;
			case "--hidden":
				args.hidden = true;
				break;
			case "--trailing-slash":
				args.trailingSlash = true;
				break;
			case "--no-label-slash":
				args.labelTrailingSlash = false;
				break;
			case "--preview":
				args.preview = true;
				break;
			case "--debug":
				args.debug = true;
				break;
			case "--cwd": {
				const value = argv[++i];
				if (value === undefined) return { ok: false, error: "--cwd requires a directory" };
				args.cwd = value;
				break;
			}
			case "--offset": {
				const value = Number(argv[++i]);
				if (!Number.isInteger(value) || value < 0) return { ok: false, error: "--offset requires a column number" };
				args.offset = value;
				break;
			}
			default:
				if (arg.startsWith("--")) {
					return { ok: false, error: `Unknown option: ${arg}` };
				}
				positional.push(arg);
		}
	}

	if (positional.length > 1) {
		return { ok: false, error: "Expected a single text argument (quote it)" };
	}
	args.line = positional[0] ?? "";
	return { ok: true, args };
}
