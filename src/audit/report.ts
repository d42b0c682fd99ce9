import type { AuditReport, Finding } from "./types.js";

export const COLORS = {
	reset: "\x1b[0m",
	bold: "\x1b[1m",
	red: "\x1b[31m",
	green: "\x1b[32m",
	yellow: "\x1b[33m",
	gray: "\x1b[90m",
} as const;

const PREVIEW_LIMIT = 5;

/** One-line description of a finding for console and markdown output */
export function describeFinding(finding: Finding): string {
	switch (finding.kind) {
		case "branding":
			return `${finding.file}: ${finding.message}`;
		case "stale_stat":
			return `${finding.file}: ${finding.stat} issue (found ${finding.found}, expected ${finding.expected})`;
		case "stale_date":
			return `${finding.file}: date issue`;
		case "broken_link":
			return `${finding.base}: ${finding.link}`;
		case "health":
			return `${finding.file}: ${finding.message}`;
	}
}

function section(lines: string[], title: string, findings: readonly Finding[], color: string): void {
	const countColor = findings.length === 0 ? COLORS.green : color;
	lines.push(`${COLORS.bold}${title}:${COLORS.reset} ${countColor}${findings.length}${COLORS.reset}`);
	for (const finding of findings.slice(0, PREVIEW_LIMIT)) {
		lines.push(`  - ${describeFinding(finding)}`);
	}
	if (findings.length > PREVIEW_LIMIT) {
		lines.push(`  ${COLORS.gray}... and ${findings.length - PREVIEW_LIMIT} more${COLORS.reset}`);
	}
	lines.push("");
}

export function formatAuditReport(report: AuditReport): string {
	const lines: string[] = [];

	lines.push("");
	lines.push("=".repeat(60));
	lines.push(`${COLORS.bold}⟡ ECOSYSTEM AUDIT REPORT${COLORS.reset}`);
	lines.push("=".repeat(60));
	lines.push(`Timestamp: ${report.timestamp}`);
	lines.push("");

	section(lines, "BRANDING VIOLATIONS", report.brandingViolations, COLORS.red);
	section(lines, "STALE STATISTICS", report.staleStats, COLORS.yellow);
	section(lines, "BROKEN LINKS", report.brokenLinks, COLORS.red);
	section(lines, "HEALTH ISSUES", report.healthIssues, COLORS.yellow);

	const statusColor = report.summary.status === "PASS" ? COLORS.green : COLORS.red;
	lines.push("-".repeat(60));
	lines.push(`STATUS: ${statusColor}${COLORS.bold}${report.summary.status}${COLORS.reset}`);
	lines.push("=".repeat(60));

	return lines.join("\n");
}

function escapeCell(s: string): string {
	return s.replace(/\|/g, "\\|").replace(/\n/g, " ");
}

export function generateMarkdownReport(report: AuditReport, reposRoot: string): string {
	const lines: string[] = [];
	const { summary } = report;

	lines.push("# Ecosystem Audit Report");
	lines.push("");
	lines.push(`**Repositories:** ${reposRoot}`);
	lines.push(`**Audited:** ${report.timestamp}`);
	lines.push(`**Status:** ${summary.status}`);
	lines.push("");
	lines.push("| Category | Count |");
	lines.push("|----------|-------|");
	lines.push(`| Branding violations | ${summary.brandingViolations} |`);
	lines.push(`| Stale statistics | ${summary.staleStats} |`);
	lines.push(`| Broken links | ${summary.brokenLinks} |`);
	lines.push(`| Health issues | ${summary.healthIssues} |`);
	lines.push("");

	const sections: [string, readonly Finding[]][] = [
		["Branding Violations", report.brandingViolations],
		["Stale Statistics", report.staleStats],
		["Broken Links", report.brokenLinks],
		["Health Issues", report.healthIssues],
	];

	for (const [title, findings] of sections) {
		if (findings.length === 0) continue;
		lines.push(`## ${title} (${findings.length})`);
		lines.push("");
		lines.push("| File | Detail |");
		lines.push("|------|--------|");
		for (const finding of findings) {
			const detail = finding.kind === "broken_link" ? `\`${finding.link}\`` : finding.message;
			lines.push(`| ${escapeCell(finding.file)} | ${escapeCell(detail)} |`);
		}
		lines.push("");
	}

	if (summary.brandingViolations + summary.staleStats + summary.brokenLinks + summary.healthIssues === 0) {
		lines.push("No issues found.");
		lines.push("");
	}

	return lines.join("\n");
}
