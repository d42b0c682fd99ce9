export type FindingKind = "branding" | "stale_stat" | "stale_date" | "broken_link" | "health";

interface FindingBase {
	/** Path of the file (or repository directory) the finding is about */
	readonly file: string;
	readonly message: string;
}

export interface BrandingFinding extends FindingBase {
	readonly kind: "branding";
	/** Source of the matching pattern, or `title_glyph` for the title check */
	readonly pattern: string;
}

export interface StaleStatFinding extends FindingBase {
	readonly kind: "stale_stat";
	readonly stat: string;
	readonly expected: number;
	readonly found: number;
}

export interface StaleDateFinding extends FindingBase {
	readonly kind: "stale_date";
}

export interface BrokenLinkFinding extends FindingBase {
	readonly kind: "broken_link";
	readonly link: string;
	/** Directory the link was resolved against */
	readonly base: string;
}

export type HealthCheck = "missing_repository" | "missing_file";

export interface HealthFinding extends FindingBase {
	readonly kind: "health";
	readonly check: HealthCheck;
}

export type FreshnessFinding = StaleStatFinding | StaleDateFinding;

export type Finding = BrandingFinding | FreshnessFinding | BrokenLinkFinding | HealthFinding;

/** Pattern-based check over the raw text of one file */
export interface ContentAnalyzer<F extends Finding = Finding> {
	scan(text: string, file: string): readonly F[];
}

export type AuditStatus = "PASS" | "ISSUES_FOUND";

export interface AuditSummary {
	readonly brandingViolations: number;
	readonly staleStats: number;
	readonly brokenLinks: number;
	readonly healthIssues: number;
	readonly status: AuditStatus;
}

export interface AuditReport {
	readonly timestamp: string;
	readonly brandingViolations: readonly BrandingFinding[];
	readonly staleStats: readonly FreshnessFinding[];
	readonly brokenLinks: readonly BrokenLinkFinding[];
	readonly healthIssues: readonly HealthFinding[];
	readonly summary: AuditSummary;
}

/** Which analyzers to run; health checks always run */
export interface AuditScope {
	readonly branding: boolean;
	readonly stats: boolean;
	readonly links: boolean;
}

export const FULL_SCOPE: AuditScope = { branding: true, stats: true, links: true };

export interface Inventory {
	/** Approved branding tokens */
	readonly branding: Readonly<Record<string, unknown>>;
	/** Category name to repository names */
	readonly repos: Readonly<Record<string, readonly string[]>>;
}

/** Report as emitted by `audit --json` */
export interface AuditDocument {
	readonly timestamp: string;
	readonly branding_violations: readonly BrandingFinding[];
	readonly stale_stats: readonly FreshnessFinding[];
	readonly broken_links: readonly BrokenLinkFinding[];
	readonly health_issues: readonly HealthFinding[];
	readonly summary: {
		readonly branding_violations: number;
		readonly stale_stats: number;
		readonly broken_links: number;
		readonly health_issues: number;
		readonly status: AuditStatus;
	};
}
