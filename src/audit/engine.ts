import { existsSync } from "node:fs";
import { join } from "node:path";
import { FileSystemSource, type SourceReader } from "../ecosystem/source.js";
import type { AuditRules } from "../lib/rules.js";
import { BrandingAnalyzer } from "./analyzers/branding.js";
import { FreshnessAnalyzer } from "./analyzers/freshness.js";
import { LinkAnalyzer } from "./analyzers/links.js";
import { brandingGlyph } from "./inventory.js";
import type {
	AuditDocument,
	AuditReport,
	AuditScope,
	AuditSummary,
	BrandingFinding,
	BrokenLinkFinding,
	ContentAnalyzer,
	Finding,
	FreshnessFinding,
	HealthFinding,
	Inventory,
} from "./types.js";
import { FULL_SCOPE } from "./types.js";

export interface AuditOptions {
	readonly rules: AuditRules;
	readonly scope?: AuditScope;
	readonly now?: Date;
}

/**
 * Run an analyzer over one file. A file that cannot be read, or is not
 * UTF-8 text, contributes no findings.
 */
export function scanFile<F extends Finding>(
	source: SourceReader,
	relativePath: string,
	analyzer: ContentAnalyzer<F>,
): readonly F[] {
	let text: string;
	try {
		text = source.readText(relativePath);
	} catch {
		return [];
	}
	return analyzer.scan(text, join(source.root, relativePath));
}

/** Existing key files in list order; glob entries expand to their sorted matches */
export function resolveKeyFiles(
	source: SourceReader,
	patterns: readonly string[],
	ignoredDirs: ReadonlySet<string>,
): string[] {
	const files: string[] = [];
	for (const pattern of patterns) {
		if (pattern.includes("*")) {
			files.push(...source.enumerate(pattern, ignoredDirs));
		} else if (source.exists(pattern)) {
			files.push(pattern);
		}
	}
	return files;
}

export function summarize(report: Omit<AuditReport, "summary" | "timestamp">): AuditSummary {
	const brandingViolations = report.brandingViolations.length;
	const brokenLinks = report.brokenLinks.length;
	return {
		brandingViolations,
		staleStats: report.staleStats.length,
		brokenLinks,
		healthIssues: report.healthIssues.length,
		// Stale statistics and dates are advisory and never fail an audit
		status: brandingViolations === 0 && brokenLinks === 0 ? "PASS" : "ISSUES_FOUND",
	};
}

/** Audit every repository named in the inventory, category by category */
export function runAudit(inventory: Inventory, reposRoot: string, options: AuditOptions): AuditReport {
	const { rules, scope = FULL_SCOPE, now = new Date() } = options;

	const branding = new BrandingAnalyzer(rules, { glyph: brandingGlyph(inventory) });
	const freshness = new FreshnessAnalyzer(rules);
	const links = new LinkAnalyzer();
	const ignoredDirs = new Set(rules.ignoredDirs);

	const brandingViolations: BrandingFinding[] = [];
	const staleStats: FreshnessFinding[] = [];
	const brokenLinks: BrokenLinkFinding[] = [];
	const healthIssues: HealthFinding[] = [];

	for (const repos of Object.values(inventory.repos)) {
		for (const name of repos) {
			const repoPath = join(reposRoot, name);
			if (!existsSync(repoPath)) {
				healthIssues.push({
					kind: "health",
					check: "missing_repository",
					file: repoPath,
					message: `Repository not found: ${name}`,
				});
				continue;
			}

			const source = new FileSystemSource(repoPath);

			if (scope.branding) {
				for (const file of resolveKeyFiles(source, rules.brandingFiles, ignoredDirs)) {
					brandingViolations.push(...scanFile(source, file, branding));
				}
			}

			if (scope.stats) {
				for (const file of rules.freshnessFiles) {
					if (source.exists(file)) staleStats.push(...scanFile(source, file, freshness));
				}
			}

			if (scope.links) {
				for (const file of source.enumerate(rules.linkGlob, ignoredDirs)) {
					brokenLinks.push(...scanFile(source, file, links));
				}
			}

			for (const file of rules.requiredFiles) {
				if (source.exists(file)) continue;
				healthIssues.push({
					kind: "health",
					check: "missing_file",
					file: join(repoPath, file),
					message: `Missing ${file}`,
				});
			}
		}
	}

	const findings = { brandingViolations, staleStats, brokenLinks, healthIssues };
	return { timestamp: now.toISOString(), ...findings, summary: summarize(findings) };
}

export function toAuditDocument(report: AuditReport): AuditDocument {
	return {
		timestamp: report.timestamp,
		branding_violations: report.brandingViolations,
		stale_stats: report.staleStats,
		broken_links: report.brokenLinks,
		health_issues: report.healthIssues,
		summary: {
			branding_violations: report.summary.brandingViolations,
			stale_stats: report.summary.staleStats,
			broken_links: report.summary.brokenLinks,
			health_issues: report.summary.healthIssues,
			status: report.summary.status,
		},
	};
}
