import type { AuditRules } from "../../lib/rules.js";
import type { ContentAnalyzer, FreshnessFinding } from "../types.js";

interface StatPattern {
	readonly regex: RegExp;
	readonly stat: string;
	readonly expected: number | null;
}

/**
 * Finds embedded statistics that drifted from their known value, and files
 * that mention old dates without mentioning the current year anywhere.
 */
export class FreshnessAnalyzer implements ContentAnalyzer<FreshnessFinding> {
	private readonly stats: readonly StatPattern[];
	private readonly dates: readonly RegExp[];
	private readonly currentYear: string;
	private readonly staleDateMessage: string;

	constructor(rules: AuditRules) {
		this.stats = rules.statPatterns.map((p) => ({
			regex: new RegExp(p.pattern, "i"),
			stat: p.stat,
			expected: p.expected,
		}));
		this.dates = rules.datePatterns.map((p) => new RegExp(p));
		this.currentYear = rules.currentYearToken;
		this.staleDateMessage = rules.staleDateMessage;
	}

	scan(text: string, file: string): readonly FreshnessFinding[] {
		const findings: FreshnessFinding[] = [];

		for (const { regex, stat, expected } of this.stats) {
			// Entries without an expected value are left dynamic on purpose
			if (expected === null) continue;
			const captured = regex.exec(text)?.[1];
			if (captured === undefined) continue;

			const found = Number.parseInt(captured, 10);
			if (found !== expected) {
				findings.push({
					kind: "stale_stat",
					file,
					stat,
					expected,
					found,
					message: `${stat} is ${found}, expected ${expected}`,
				});
			}
		}

		if (!text.includes(this.currentYear) && this.dates.some((regex) => regex.test(text))) {
			findings.push({ kind: "stale_date", file, message: this.staleDateMessage });
		}

		return findings;
	}
}
