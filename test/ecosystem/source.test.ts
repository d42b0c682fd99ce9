import { mkdirSync, symlinkSync } from "node:fs";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { FileSystemSource, globToRegExp } from "../../src/ecosystem/source.js";
import { cleanupTmpDirs, tmpDir, writeTree } from "../helpers.js";

afterEach(cleanupTmpDirs);

describe("globToRegExp", () => {
	it("should match markdown files at any depth with **", () => {
		const re = globToRegExp("**/*.md");
		expect(re.test("README.md")).toBe(true);
		expect(re.test("docs/guide.md")).toBe(true);
		expect(re.test("a/b/c/deep.md")).toBe(true);
		expect(re.test("notes.mdx")).toBe(false);
	});

	it("should keep * within a single path segment", () => {
		const re = globToRegExp("src/pages/*.jsx");
		expect(re.test("src/pages/Home.jsx")).toBe(true);
		expect(re.test("src/pages/nested/About.jsx")).toBe(false);
		expect(re.test("src/pages/Home.tsx")).toBe(false);
	});

	it("should treat dots literally", () => {
		const re = globToRegExp("package.json");
		expect(re.test("package.json")).toBe(true);
		expect(re.test("packageXjson")).toBe(false);
	});
});

describe("FileSystemSource", () => {
	it("should enumerate sorted files and skip ignored directories", () => {
		const root = tmpDir();
		writeTree(root, {
			"README.md": "# Root",
			"docs/b.md": "b",
			"docs/a.md": "a",
			"docs/image.png": "png",
			"node_modules/pkg/README.md": "dependency",
		});

		const source = new FileSystemSource(root);
		expect(source.enumerate("**/*.md", new Set(["node_modules"]))).toEqual(["README.md", "docs/a.md", "docs/b.md"]);
	});

	it("should include every directory when nothing is ignored", () => {
		const root = tmpDir();
		writeTree(root, { "vendor/lib/NOTES.md": "n" });

		expect(new FileSystemSource(root).enumerate("**/*.md")).toEqual(["vendor/lib/NOTES.md"]);
	});

	it("should read a prefix of a file", () => {
		const root = tmpDir();
		writeTree(root, { "README.md": "abcdefghij" });

		const source = new FileSystemSource(root);
		expect(source.readText("README.md", 4)).toBe("abcd");
		expect(source.readText("README.md")).toBe("abcdefghij");
	});

	it("should follow linked files and directories", () => {
		const root = tmpDir();
		const shared = tmpDir();
		writeTree(shared, { "GUIDE.md": "g", "handbook/intro.md": "i" });
		writeTree(root, { "README.md": "# Root" });
		symlinkSync(join(shared, "GUIDE.md"), join(root, "GUIDE.md"));
		symlinkSync(join(shared, "handbook"), join(root, "handbook"));

		expect(new FileSystemSource(root).enumerate("**/*.md")).toEqual(["GUIDE.md", "README.md", "handbook/intro.md"]);
	});

	it("should stop at a link back to an enclosing directory", () => {
		const root = tmpDir();
		writeTree(root, { "docs/a.md": "a" });
		symlinkSync(root, join(root, "docs", "loop"));
		mkdirSync(join(root, "empty"));

		expect(new FileSystemSource(root).enumerate("**/*.md")).toEqual(["docs/a.md"]);
	});

	it("should read a prefix without decoding the rest of the file", () => {
		const root = tmpDir();
		writeTree(root, { "README.md": Buffer.concat([Buffer.from("abcdefghij".repeat(10)), Buffer.from([0xff])]) });

		const source = new FileSystemSource(root);
		expect(source.readText("README.md", 4)).toBe("abcd");
		expect(() => source.readText("README.md")).toThrow();
	});

	it("should throw on invalid UTF-8", () => {
		const root = tmpDir();
		writeTree(root, { "bin.md": Buffer.from([0xff, 0xfe, 0x41]) });

		expect(() => new FileSystemSource(root).readText("bin.md")).toThrow();
	});

	it("should report existence of files and directories", () => {
		const root = tmpDir();
		writeTree(root, { "src/pages/Home.jsx": "" });

		const source = new FileSystemSource(root);
		expect(source.exists("src/pages")).toBe(true);
		expect(source.exists("src/pages/Home.jsx")).toBe(true);
		expect(source.exists("index.html")).toBe(false);
		expect(source.root).toBe(root);
	});
});
