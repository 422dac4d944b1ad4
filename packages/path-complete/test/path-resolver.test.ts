import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
	type CursorContext,
	canonicalize,
	findPathStart,
	matchPath,
	type ResolverEnvironment,
	resolveDirectory,
	resolveDirname,
} from "../src/path-resolver.js";

const posix: ResolverEnvironment = {
	platform: "posix",
	homedir: "/home/tester",
	env: { HOME: "/home/tester", PROJECT: "/srv/project" },
};

const win32: ResolverEnvironment = {
	platform: "win32",
	homedir: "C:\\Users\\tester",
	env: {},
};

function at(lineBeforeCursor: string, extra: Partial<CursorContext> = {}): CursorContext {
	return { lineBeforeCursor, offset: lineBeforeCursor.length + 1, ...extra };
}

function resolve(line: string, cwd = "/home/u/project", extra: Partial<CursorContext> = {}): string | null {
	return resolveDirname(at(line, extra), cwd, { environment: posix });
}

describe("findPathStart", () => {
	it("finds the first separator of a relative path", () => {
		assert.equal(findPathStart("a/b", "posix"), 1);
		assert.equal(findPathStart("cd /usr/", "posix"), 3);
	});

	it("returns -1 when the text has no separator", () => {
		assert.equal(findPathStart("abc", "posix"), -1);
	});

	it("treats a backslash as a separator only on win32", () => {
		assert.equal(findPathStart("dir\\x", "posix"), -1);
		assert.equal(findPathStart("dir\\x", "win32"), 3);
	});

	it("stays fast on long runs of dots", () => {
		const started = Date.now();
		assert.equal(findPathStart(`${".".repeat(2000)}x`, "posix"), 0);
		assert.ok(Date.now() - started < 2000);
	});
});

describe("matchPath", () => {
	it("splits the prefix from the directory being typed", () => {
		assert.deepEqual(matchPath("~/segment/", "posix"), {
			input: "~/segment/",
			prefix: "~/",
			dirname: "segment/",
		});
	});

	it("drops the letters of the name being typed", () => {
		assert.deepEqual(matchPath("cd /usr/lo", "posix"), { input: "cd /usr/lo", prefix: "cd /", dirname: "usr/" });
	});
});

describe("canonicalize", () => {
	it("collapses dot segments and trailing slashes", () => {
		assert.equal(canonicalize("/a/b/../c/", "/x", "posix"), "/a/c");
	});

	it("joins relative paths onto cwd", () => {
		assert.equal(canonicalize("rel", "/x", "posix"), "/x/rel");
	});

	it("keeps the root", () => {
		assert.equal(canonicalize("/", "/x", "posix"), "/");
	});

	it("normalizes separators on win32", () => {
		assert.equal(canonicalize("C:/Users/", "C:\\", "win32"), "C:\\Users");
	});
});

describe("resolveDirectory", () => {
	it("resolves ../ against the parent of cwd", () => {
		assert.deepEqual(resolveDirectory(at("../src/"), "/home/u/project", { environment: posix }), {
			directory: "/home/u/src",
			rule: "dot-relative",
		});
	});

	it("resolves ../ after other text with the parent rule", () => {
		assert.deepEqual(resolveDirectory(at("x ../lib/"), "/home/u/project", { environment: posix }), {
			directory: "/home/u/lib",
			rule: "parent",
		});
	});

	it("resolves ./ after other text against cwd", () => {
		assert.deepEqual(resolveDirectory(at("foo ./bar/"), "/home/u/project", { environment: posix }), {
			directory: "/home/u/project/bar",
			rule: "current",
		});
	});

	it("resolves a quoted path against cwd", () => {
		assert.deepEqual(resolveDirectory(at('"src/'), "/home/u/project", { environment: posix }), {
			directory: "/home/u/project/src",
			rule: "current",
		});
	});

	it("expands ~/", () => {
		assert.deepEqual(resolveDirectory(at("~/segment/"), "/anywhere", { environment: posix }), {
			directory: "/home/tester/segment",
			rule: "home",
		});
	});

	it("expands a defined environment variable", () => {
		assert.deepEqual(resolveDirectory(at("$PROJECT/docs/"), "/anywhere", { environment: posix }), {
			directory: "/srv/project/docs",
			rule: "env",
		});
	});

	it("leaves an undefined environment variable unresolved", () => {
		assert.equal(resolve("$NOPE/"), null);
	});

	it("resolves a bare relative directory", () => {
		assert.deepEqual(resolveDirectory(at("lua/"), "/root", { environment: posix }), {
			directory: "/root/lua",
			rule: "relative",
		});
	});

	it("resolves an absolute path after a command", () => {
		assert.deepEqual(resolveDirectory(at("cd /usr/"), "/home/u/project", { environment: posix }), {
			directory: "/usr",
			rule: "absolute",
		});
	});

	it("resolves exactly . to cwd", () => {
		assert.deepEqual(resolveDirectory(at("."), "/home/u/project", { environment: posix }), {
			directory: "/home/u/project",
			rule: "dot",
		});
	});

	it("resolves a leading hidden name to cwd", () => {
		assert.deepEqual(resolveDirectory(at(".lo"), "/home/u/project", { environment: posix }), {
			directory: "/home/u/project",
			rule: "hidden-name",
		});
	});

	for (const notAName of ["x = .5", "a .. b", "f(.", "x . y"]) {
		it(`leaves the dot in ${JSON.stringify(notAName)} unresolved`, () => {
			assert.equal(resolve(notAName), null);
		});
	}

	it("splits unquoted names at spaces", () => {
		assert.deepEqual(resolveDirectory(at("My Documents/"), "/home/u/project", { environment: posix }), {
			directory: "/home/u/project/Documents",
			rule: "relative",
		});
	});

	it("keeps spaces in a quoted name", () => {
		assert.deepEqual(resolveDirectory(at('"My Documents/'), "/home/u/project", { environment: posix }), {
			directory: "/home/u/project/My Documents",
			rule: "current",
		});
	});

	it("resolves a trailing . inside a directory to that directory", () => {
		assert.equal(resolve("lua/.", "/root"), "/root/lua");
	});

	it("lists cwd for a bare word", () => {
		assert.deepEqual(resolveDirectory(at("REA"), "/home/u/project", { environment: posix }), {
			directory: "/home/u/project",
			rule: "no-match",
		});
	});

	it("falls back to the text up to the last separator when nothing matches", () => {
		assert.deepEqual(resolveDirectory(at("lua/x:"), "/root", { environment: posix }), {
			directory: "/root/lua",
			rule: "no-match",
		});
	});

	for (const lookalike of ["http://", "</", "(a+b)/", "x = 3/"]) {
		it(`leaves ${JSON.stringify(lookalike)} unresolved`, () => {
			assert.equal(resolve(lookalike), null);
		});
	}

	it("treats a slash-only line as a comment in slash-commented buffers", () => {
		assert.equal(resolve("//", "/tmp", { filetype: "typescript", commentString: "// %s" }), null);
		assert.equal(resolve("//", "/tmp", { filetype: "", commentString: "// %s" }), "/");
	});

	it("accepts a custom guard list", () => {
		assert.equal(resolveDirname(at("http://"), "/tmp", { environment: posix, guards: [] }), "/");
	});

	it("accepts a custom rule table", () => {
		const resolution = resolveDirectory(at("lua/"), "/root", {
			environment: posix,
			rules: [{ name: "always", apply: () => "/srv" }],
		});
		assert.deepEqual(resolution, { directory: "/srv", rule: "always" });
	});

	it("returns the same result for the same context", () => {
		const context = at("../src/");
		const first = resolveDirname(context, "/home/u/project", { environment: posix });
		assert.equal(resolveDirname(context, "/home/u/project", { environment: posix }), first);
	});

	describe("on win32", () => {
		it("resolves a drive letter", () => {
			assert.deepEqual(resolveDirectory(at("C:\\Users\\"), "D:\\work", { environment: win32 }), {
				directory: "C:\\Users",
				rule: "drive",
			});
		});

		it("resolves a relative path with backslashes", () => {
			assert.equal(resolveDirname(at("src\\"), "D:\\work", { environment: win32 }), "D:\\work\\src");
		});
	});
});
