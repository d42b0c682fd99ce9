/**
 * Command implementations behind the CLI. Each returns the process exit code
 * and prints to the console; none of them exits the process itself.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { runAudit, toAuditDocument } from "./audit/engine.js";
import { loadInventory } from "./audit/inventory.js";
import { COLORS as C, formatAuditReport, generateMarkdownReport } from "./audit/report.js";
import type { AuditScope } from "./audit/types.js";
import { FULL_SCOPE } from "./audit/types.js";
import {
	buildIndex,
	createIndexDocument,
	loadKnownRepositories,
	readIndexDocument,
	writeIndexDocument,
} from "./ecosystem/builder.js";
import { generateMermaid, generateSvg } from "./ecosystem/graph.js";
import type { IndexDocument } from "./ecosystem/types.js";
import { validateRepositories } from "./ecosystem/validator.js";
import type { Config } from "./lib/config.js";
import type { AuditRules, EcosystemRules } from "./lib/rules.js";
import { formatDuration } from "./lib/utils.js";

export interface CommandContext {
	readonly config: Config;
	readonly ecosystemRules: EcosystemRules;
	readonly auditRules: AuditRules;
}

const MISSING_METADATA_PREVIEW = 10;

// --- index ---

export function runIndexCommand(ctx: CommandContext): { readonly exitCode: number; readonly document: IndexDocument } {
	const { config, ecosystemRules } = ctx;

	console.log(`Scanning ${config.ECOSYSTEM_REPOS_DIR}...`);
	const startTime = Date.now();
	const result = buildIndex(config.ECOSYSTEM_REPOS_DIR, ecosystemRules);
	for (const diagnostic of result.diagnostics) console.warn(`${C.yellow}Warning: ${diagnostic}${C.reset}`);

	console.log(
		`Found ${result.all.length} total repos, ${result.records.length} ecosystem repos (${formatDuration(Date.now() - startTime)})`,
	);

	const document = createIndexDocument(result, {
		version: config.ECOSYSTEM_INDEX_VERSION,
		totalRepos: config.ECOSYSTEM_TOTAL_REPOS,
		publicRepos: config.ECOSYSTEM_PUBLIC_REPOS,
		privateRepos: config.ECOSYSTEM_PRIVATE_REPOS,
	});
	writeIndexDocument(config.ECOSYSTEM_INDEX_PATH, document);
	console.log(`\nWrote ${config.ECOSYSTEM_INDEX_PATH}`);

	console.log(`\n${C.bold}Layer summary:${C.reset}`);
	for (const summary of result.layers) {
		console.log(`  ${summary.layer}: ${summary.count} repos`);
	}

	const missing = result.records.filter((r) => !r.hasMetadata).map((r) => r.name);
	if (missing.length > 0) {
		console.log(`\nRepos missing ${ecosystemRules.metadataFile} (${missing.length}):`);
		for (const name of missing.slice(0, MISSING_METADATA_PREVIEW)) console.log(`  - ${name}`);
		if (missing.length > MISSING_METADATA_PREVIEW) {
			console.log(`  ${C.gray}... and ${missing.length - MISSING_METADATA_PREVIEW} more${C.reset}`);
		}
	}

	return { exitCode: 0, document };
}

// --- validate ---

export function runValidateCommand(ctx: CommandContext, knownRepos?: ReadonlySet<string>): number {
	const { config, ecosystemRules } = ctx;
	const known = knownRepos ?? loadKnownRepositories(config.ECOSYSTEM_INDEX_PATH);

	console.log(`Validating ${ecosystemRules.metadataFile} files...\n`);
	const summary = validateRepositories(config.ECOSYSTEM_REPOS_DIR, known, ecosystemRules.metadataFile);

	for (const { name, errors } of summary.results) {
		if (errors.length === 0) {
			console.log(`${C.green}[OK]${C.reset}   ${name}`);
			continue;
		}
		console.log(`${C.red}[FAIL]${C.reset} ${name}`);
		for (const error of errors) console.log(`       - ${error}`);
	}

	console.log(`\n${"=".repeat(50)}`);
	console.log(`Checked: ${summary.checked} repos`);
	console.log(`Errors:  ${summary.totalErrors}`);
	console.log(`Failed:  ${summary.failed.length} repos`);

	if (summary.failed.length > 0) return 1;
	console.log(`\n${C.green}All metadata files valid!${C.reset}`);
	return 0;
}

// --- scan ---

/** Build and write the index, then validate every metadata file against it */
export function runScanCommand(ctx: CommandContext): number {
	const { document } = runIndexCommand(ctx);
	console.log("");
	return runValidateCommand(ctx, new Set(document.repos.map((r) => r.name)));
}

// --- audit ---

export interface AuditCommandOptions {
	readonly scope: AuditScope;
	readonly json: boolean;
	readonly reposRoot: string;
	/** Markdown report destination, when one was requested */
	readonly reportPath?: string;
}

export const DEFAULT_REPORT_PATH = "audit-report.md";

export function parseAuditArgs(args: readonly string[], defaultReposRoot: string): AuditCommandOptions {
	const links = args.includes("--links");
	const branding = args.includes("--branding");
	const stats = args.includes("--stats");
	const scope = links || branding || stats ? { links, branding, stats } : FULL_SCOPE;

	let reposRoot = defaultReposRoot;
	const reposIndex = args.indexOf("--repos");
	if (reposIndex !== -1) {
		const value = args[reposIndex + 1];
		if (!value || value.startsWith("-")) throw new Error("--repos requires a path");
		reposRoot = value;
	}

	let reportPath: string | undefined;
	const reportIndex = args.indexOf("--report");
	if (reportIndex !== -1) {
		const value = args[reportIndex + 1];
		reportPath = value && !value.startsWith("-") ? value : DEFAULT_REPORT_PATH;
	}

	return { scope, json: args.includes("--json"), reposRoot, reportPath };
}

export function runAuditCommand(ctx: CommandContext, options: AuditCommandOptions): number {
	const inventory = loadInventory(ctx.config.ECOSYSTEM_INVENTORY_PATH);
	const report = runAudit(inventory, options.reposRoot, { rules: ctx.auditRules, scope: options.scope });

	if (options.json) {
		console.log(JSON.stringify(toAuditDocument(report), null, 2));
	} else {
		console.log(formatAuditReport(report));
	}

	if (options.reportPath) {
		writeFileSync(options.reportPath, generateMarkdownReport(report, options.reposRoot), "utf-8");
		if (!options.json) console.log(`\n${C.green}Report saved to: ${options.reportPath}${C.reset}`);
	}

	return report.summary.status === "PASS" ? 0 : 1;
}

// --- graph ---

export function runGraphCommand(ctx: CommandContext, title = "Ecosystem"): number {
	const { config } = ctx;

	console.log(`Loading ${config.ECOSYSTEM_INDEX_PATH}...`);
	const index = readIndexDocument(config.ECOSYSTEM_INDEX_PATH);

	mkdirSync(config.ECOSYSTEM_ASSETS_DIR, { recursive: true });
	const svgPath = join(config.ECOSYSTEM_ASSETS_DIR, "ecosystem-graph.svg");
	const mermaidPath = join(config.ECOSYSTEM_ASSETS_DIR, "ecosystem-graph.mmd");

	writeFileSync(svgPath, generateSvg(index, title), "utf-8");
	console.log(`Wrote ${svgPath}`);
	writeFileSync(mermaidPath, generateMermaid(index), "utf-8");
	console.log(`Wrote ${mermaidPath}`);

	return 0;
}
