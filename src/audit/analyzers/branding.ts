import { extname } from "node:path";
import type { AuditRules } from "../../lib/rules.js";
import type { BrandingFinding, ContentAnalyzer } from "../types.js";

interface BrandingPattern {
	readonly regex: RegExp;
	readonly source: string;
	readonly message: string;
}

export interface BrandingOptions {
	/** Overrides the glyph required in page titles */
	readonly glyph?: string;
}

export const TITLE_GLYPH_PATTERN = "title_glyph";

/**
 * Text between the first `<title>` and the `</title>` that follows it, or
 * null when the file has no such pair.
 */
export function extractTitle(text: string): string | null {
	const open = text.indexOf("<title>");
	if (open === -1) return null;
	const start = open + "<title>".length;
	const close = text.indexOf("</title>", start);
	if (close === -1) return null;
	return text.slice(start, close);
}

/**
 * Flags deprecated naming and formatting. Each pattern reports at most once
 * per file however often it occurs.
 */
export class BrandingAnalyzer implements ContentAnalyzer<BrandingFinding> {
	private readonly patterns: readonly BrandingPattern[];
	private readonly titleExtensions: ReadonlySet<string>;
	private readonly glyph: string;
	private readonly glyphMessage: string;

	constructor(rules: AuditRules, options: BrandingOptions = {}) {
		this.patterns = rules.brandingPatterns.map((p) => ({
			regex: new RegExp(p.pattern, "i"),
			source: p.pattern,
			message: p.message,
		}));
		this.titleExtensions = new Set(rules.titleGlyph.extensions);
		this.glyph = options.glyph ?? rules.titleGlyph.glyph;
		this.glyphMessage = rules.titleGlyph.message.replaceAll("{glyph}", this.glyph);
	}

	scan(text: string, file: string): readonly BrandingFinding[] {
		const findings: BrandingFinding[] = [];

		for (const { regex, source, message } of this.patterns) {
			if (regex.test(text)) {
				findings.push({ kind: "branding", file, pattern: source, message });
			}
		}

		if (this.titleExtensions.has(extname(file))) {
			const title = extractTitle(text);
			if (title !== null && !title.includes(this.glyph)) {
				findings.push({ kind: "branding", file, pattern: TITLE_GLYPH_PATTERN, message: this.glyphMessage });
			}
		}

		return findings;
	}
}
