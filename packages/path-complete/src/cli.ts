#!/usr/bin/env node
/**
 * CLI 入口文件
 *
 * 测试方式：npx tsx src/cli.ts "../src/"
 */

import { main } from "./main.js";

main(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		console.error("Error:", error instanceof Error ? error.message : String(error));
		process.exitCode = 1;
	},
);
