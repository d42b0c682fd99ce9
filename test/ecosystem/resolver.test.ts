import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import {
	UNRESOLVED,
	firstResolved,
	guessLayer,
	guessStatus,
	isEcosystemRepository,
	parseReadme,
	readMetadata,
	resolveAttributes,
	resolved,
} from "../../src/ecosystem/resolver.js";
import { FileSystemSource } from "../../src/ecosystem/source.js";
import { loadEcosystemRules } from "../../src/lib/rules.js";
import { cleanupTmpDirs, tmpDir, writeTree } from "../helpers.js";

const rules = loadEcosystemRules();

afterEach(cleanupTmpDirs);

function repo(name: string, files: Record<string, string>): FileSystemSource {
	const root = join(tmpDir(), name);
	writeTree(root, files);
	return new FileSystemSource(root);
}

describe("firstResolved", () => {
	it("should pick the first resolved candidate", () => {
		const result = firstResolved([UNRESOLVED, resolved("b", "readme"), resolved("c", "metadata")], () => "z");
		expect(result).toEqual({ value: "b", source: "readme" });
	});

	it("should fall back to the heuristic", () => {
		expect(firstResolved<string>([UNRESOLVED], () => "z")).toEqual({ value: "z", source: "heuristic" });
	});
});

describe("parseReadme", () => {
	it("should extract lowercased markers and the title line", () => {
		const info = parseReadme("# My Project\n\n**Layer:** Runtime\n**Status:** Stable\n", 150);
		expect(info).toEqual({ layer: "runtime", status: "stable", description: "My Project" });
	});

	it("should drop a title that is not shorter than the limit", () => {
		const info = parseReadme(`# ${"x".repeat(150)}\n`, 150);
		expect(info.description).toBeUndefined();
	});

	it("should strip surrounding hashes and spaces from the title", () => {
		expect(parseReadme("\n\n## Gate Service ##\nbody", 150).description).toBe("Gate Service");
	});

	it("should leave markers unresolved when absent", () => {
		const info = parseReadme("Plain text", 150);
		expect(info.layer).toBeUndefined();
		expect(info.status).toBeUndefined();
	});
});

describe("guessLayer", () => {
	it("should prefer an exact name match over containment", () => {
		expect(guessLayer("mirrordna-mcp", rules)).toBe("runtime");
		expect(guessLayer("activemirror-site", rules)).toBe("application");
	});

	it("should take the first layer whose entry is contained in the name", () => {
		expect(guessLayer("MirrorDNA-tools", rules)).toBe("protocol");
	});

	it("should use the first table entry for names listed twice", () => {
		expect(guessLayer("lingos", rules)).toBe("protocol");
	});

	it("should default to research", () => {
		expect(guessLayer("random-tool", rules)).toBe("research");
	});
});

describe("guessStatus", () => {
	it("should classify by name", () => {
		expect(guessStatus("oversight-prototype", rules)).toBe("alpha");
		expect(guessStatus("mirror-swarm-demo", rules)).toBe("alpha");
		expect(guessStatus("mirrordna-examples", rules)).toBe("beta");
		expect(guessStatus("MirrorDNA", rules)).toBe("stable");
		expect(guessStatus("something-else", rules)).toBe("beta");
	});
});

describe("isEcosystemRepository", () => {
	it("should exclude names with excluded prefixes", () => {
		expect(isEcosystemRepository("awesome-lists", rules)).toBe(false);
		expect(isEcosystemRepository("mem0", rules)).toBe(false);
		expect(isEcosystemRepository("MirrorDNA", rules)).toBe(true);
	});
});

describe("readMetadata", () => {
	it("should treat unparseable YAML as absent", () => {
		const source = repo("broken", { "metadata.yml": "layer: [unclosed" });
		expect(readMetadata(source, "metadata.yml")).toBeNull();
	});

	it("should treat a non-mapping document as absent", () => {
		const source = repo("listy", { "metadata.yml": "- a\n- b\n" });
		expect(readMetadata(source, "metadata.yml")).toBeNull();
	});
});

describe("resolveAttributes", () => {
	it("should resolve each attribute from its own highest-precedence source", () => {
		const source = repo("mirrorgate", {
			"metadata.yml": "layer: infrastructure\ndependencies:\n  - MirrorDNA\n",
			"README.md": "# Gate Service\n**Status:** alpha\n**Layer:** protocol\n",
		});

		const attrs = resolveAttributes(source, "mirrorgate", rules);
		expect(attrs.layer).toBe("infrastructure");
		expect(attrs.status).toBe("alpha");
		expect(attrs.description).toBe("Gate Service");
		expect(attrs.dependencies).toEqual(["MirrorDNA"]);
		expect(attrs.tags).toEqual(["infrastructure", "mirrordna"]);
		expect(attrs.hasMetadata).toBe(true);
		expect(attrs.hasReadme).toBe(true);
		expect(attrs.provenance).toEqual({
			layer: "metadata",
			status: "readme",
			description: "readme",
			dependencies: "metadata",
			tags: "heuristic",
		});
	});

	it("should fall back to heuristics for an empty directory", () => {
		const source = repo("mirrordna-mcp", {});

		const attrs = resolveAttributes(source, "mirrordna-mcp", rules);
		expect(attrs).toMatchObject({
			layer: "runtime",
			status: "stable",
			description: "mirrordna-mcp - MirrorDNA ecosystem component",
			dependencies: [],
			tags: ["runtime", "mirrordna"],
			hasMetadata: false,
			hasReadme: false,
		});
	});

	it("should use metadata values verbatim", () => {
		const source = repo("odd", {
			"metadata.yml": "layer: kernel\nstatus: 3\ntags: solo\ndependencies:\n",
		});

		const attrs = resolveAttributes(source, "odd", rules);
		expect(attrs.layer).toBe("kernel");
		expect(attrs.status).toBe("3");
		expect(attrs.tags).toEqual(["solo"]);
		expect(attrs.dependencies).toEqual([]);
		expect(attrs.provenance.dependencies).toBe("metadata");
	});

	it("should ignore a malformed metadata file", () => {
		const source = repo("MirrorBrain", { "metadata.yml": "layer: [unclosed" });

		const attrs = resolveAttributes(source, "MirrorBrain", rules);
		expect(attrs.hasMetadata).toBe(false);
		expect(attrs.layer).toBe("runtime");
		expect(attrs.provenance.layer).toBe("heuristic");
	});

	it("should only decode the README prefix it reads", () => {
		const root = join(tmpDir(), "mirrorgate");
		writeTree(root, {
			"README.md": Buffer.concat([
				Buffer.from(`# Gate Service\n**Layer:** protocol\n${"x".repeat(50000)}`),
				Buffer.from([0xff, 0xfe]),
			]),
		});

		const attrs = resolveAttributes(new FileSystemSource(root), "mirrorgate", rules);
		expect(attrs.hasReadme).toBe(true);
		expect(attrs.layer).toBe("protocol");
		expect(attrs.description).toBe("Gate Service");
	});

	it("should read the lowercase readme when README.md is absent", () => {
		const source = repo("tool", { "readme.md": "**Layer:** Language\n" });

		const attrs = resolveAttributes(source, "tool", rules);
		expect(attrs.hasReadme).toBe(true);
		expect(attrs.layer).toBe("language");
	});
});
