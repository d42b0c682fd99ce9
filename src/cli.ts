#!/usr/bin/env node
import { existsSync } from "node:fs";
import { serve } from "@hono/node-server";
import { APP_VERSION, createApp } from "./app.js";
import { runAudit } from "./audit/engine.js";
import { loadInventory } from "./audit/inventory.js";
import { COLORS as C } from "./audit/report.js";
import {
	type CommandContext,
	parseAuditArgs,
	runAuditCommand,
	runGraphCommand,
	runIndexCommand,
	runScanCommand,
	runValidateCommand,
} from "./commands.js";
import { readIndexDocument } from "./ecosystem/builder.js";
import { loadConfig } from "./lib/config.js";
import { loadAuditRules, loadEcosystemRules } from "./lib/rules.js";

function printUsage(): void {
	console.log(`
${C.bold}ecosystem-sync v${APP_VERSION}${C.reset}
Canonical index and drift audit for a family of repositories.

${C.bold}USAGE${C.reset}
  ecosystem-sync <command> [options]

${C.bold}COMMANDS${C.reset}
  scan        Build the index, then validate every metadata.yml against it
  index       Build and write the index only
  validate    Validate metadata.yml files against the existing index
  audit       Audit branding, statistics and links of inventory repositories
  graph       Render the index as SVG and Mermaid
  serve       Serve the index and audit over HTTP

${C.bold}AUDIT OPTIONS${C.reset}
  --branding       Branding audit only
  --stats          Stats freshness check only
  --links          Link check only
  --json           Output as JSON
  --repos <path>   Repository root (default: $ECOSYSTEM_REPOS_DIR or ~/repos)
  --report [path]  Also write a markdown report (default: audit-report.md)

${C.bold}ENVIRONMENT${C.reset}
  ECOSYSTEM_REPOS_DIR, ECOSYSTEM_INDEX_PATH, ECOSYSTEM_INVENTORY_PATH,
  ECOSYSTEM_ASSETS_DIR, ECOSYSTEM_INDEX_VERSION, ECOSYSTEM_TOTAL_REPOS,
  ECOSYSTEM_PUBLIC_REPOS, ECOSYSTEM_PRIVATE_REPOS, PORT

${C.bold}EXIT CODES${C.reset}
  0  Success (audit status PASS, all metadata valid)
  1  Audit issues, invalid metadata, or a fatal error
`);
}

function serveApp(ctx: CommandContext): void {
	const { config } = ctx;
	const app = createApp({
		loadIndex: () => (existsSync(config.ECOSYSTEM_INDEX_PATH) ? readIndexDocument(config.ECOSYSTEM_INDEX_PATH) : null),
		runAudit: () =>
			runAudit(loadInventory(config.ECOSYSTEM_INVENTORY_PATH), config.ECOSYSTEM_REPOS_DIR, {
				rules: ctx.auditRules,
			}),
		production: config.NODE_ENV === "production",
	});

	serve({ fetch: app.fetch, port: config.PORT }, (info) => {
		console.log(`${C.green}Listening on http://localhost:${info.port}${C.reset}`);
	});
}

async function main(): Promise<void> {
	const args = process.argv.slice(2);

	if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
		printUsage();
		process.exit(0);
	}

	if (args.includes("--version") || args.includes("-v")) {
		console.log(APP_VERSION);
		process.exit(0);
	}

	const ctx: CommandContext = {
		config: loadConfig(),
		ecosystemRules: loadEcosystemRules(),
		auditRules: loadAuditRules(),
	};

	const [command, ...rest] = args;
	switch (command) {
		case "scan":
			process.exit(runScanCommand(ctx));
			break;
		case "index":
			process.exit(runIndexCommand(ctx).exitCode);
			break;
		case "validate":
			process.exit(runValidateCommand(ctx));
			break;
		case "audit":
			process.exit(runAuditCommand(ctx, parseAuditArgs(rest, ctx.config.ECOSYSTEM_REPOS_DIR)));
			break;
		case "graph":
			process.exit(runGraphCommand(ctx));
			break;
		case "serve":
			serveApp(ctx);
			break;
		default:
			console.error(`Unknown command: ${command}`);
			printUsage();
			process.exit(1);
	}
}

main().catch((err) => {
	console.error("Fatal error:", err);
	process.exit(1);
});
