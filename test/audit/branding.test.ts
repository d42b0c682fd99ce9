import { describe, expect, it } from "vitest";

import { BrandingAnalyzer, TITLE_GLYPH_PATTERN, extractTitle } from "../../src/audit/analyzers/branding.js";
import { loadAuditRules } from "../../src/lib/rules.js";

const rules = loadAuditRules();
const analyzer = new BrandingAnalyzer(rules);

describe("BrandingAnalyzer", () => {
	it("should flag deprecated protocol naming once", () => {
		const findings = analyzer.scan("Built on the Mirror Protocol.\nSee Mirror  Protocol docs.", "/r/README.md");

		expect(findings).toEqual([
			{
				kind: "branding",
				file: "/r/README.md",
				pattern: "Mirror\\s+Protocol",
				message: "Should be 'MirrorDNA Protocol'",
			},
		]);
	});

	it("should not flag the approved names", () => {
		expect(analyzer.scan("MirrorDNA Protocol on ActiveMirrorOS at activemirror.ai © 2026", "/r/README.md")).toEqual(
			[],
		);
	});

	it("should match case-insensitively", () => {
		const findings = analyzer.scan("Visit ACTIVEMIRROR.COM", "/r/README.md");
		expect(findings.map((f) => f.message)).toEqual(["Domain should be activemirror.ai"]);
	});

	it("should report each pattern in table order", () => {
		const findings = analyzer.scan("© 2023 Active MirrorOS, Mirror Protocol", "/r/README.md");
		expect(findings.map((f) => f.message)).toEqual([
			"Should be 'MirrorDNA Protocol'",
			"Should be 'ActiveMirrorOS' (no space)",
			"Copyright year should be 2026",
		]);
	});

	it("should require the glyph in page titles", () => {
		const findings = analyzer.scan("<html><head><title>Home</title></head></html>", "/r/index.html");
		expect(findings).toEqual([
			{
				kind: "branding",
				file: "/r/index.html",
				pattern: TITLE_GLYPH_PATTERN,
				message: "Page title should include ⟡ glyph",
			},
		]);
	});

	it("should accept a title containing the glyph", () => {
		expect(analyzer.scan("<title>⟡ Home</title>", "/r/src/App.jsx")).toEqual([]);
	});

	it("should check titles only in page files", () => {
		expect(analyzer.scan("<title>Home</title>", "/r/README.md")).toEqual([]);
	});

	it("should ignore an unterminated title", () => {
		expect(analyzer.scan("<title>Home", "/r/index.html")).toEqual([]);
	});

	it("should use an overriding glyph", () => {
		const custom = new BrandingAnalyzer(rules, { glyph: "★" });
		const findings = custom.scan("<title>⟡ Home</title>", "/r/index.html");
		expect(findings.map((f) => f.message)).toEqual(["Page title should include ★ glyph"]);
	});
});

describe("extractTitle", () => {
	it("should return the text of the first title element", () => {
		expect(extractTitle("<title>One</title><title>Two</title>")).toBe("One");
		expect(extractTitle("<p>no title</p>")).toBeNull();
		expect(extractTitle("</title><title>Open")).toBeNull();
	});
});
