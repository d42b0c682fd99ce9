import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { toAuditDocument } from "./audit/engine.js";
import type { AuditReport } from "./audit/types.js";
import type { IndexDocument } from "./ecosystem/types.js";
import { LAYERS } from "./ecosystem/types.js";

export const APP_VERSION = "0.1.0";

export interface AppOptions {
	/** Current published index, or null when none has been generated */
	readonly loadIndex: () => IndexDocument | null;
	readonly runAudit: () => AuditReport;
	readonly logRequests?: boolean;
	readonly production?: boolean;
	readonly title?: string;
}

function escapeHtml(s: string): string {
	return s
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;");
}

export function renderOverview(index: IndexDocument, title: string): string {
	const sections = LAYERS.map((layer) => {
		const entry = index.layers[layer];
		const items = entry.repos.map((name) => `<li>${escapeHtml(name)}</li>`).join("");
		return `<section><h2>${layer} <small>(${entry.count})</small></h2><ul>${items}</ul></section>`;
	}).join("\n");

	return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>⟡ ${escapeHtml(title)}</title>
</head>
<body>
<h1>${escapeHtml(title)}</h1>
<p>${index.repos.length} repositories indexed, generated ${escapeHtml(index.generated)} (version ${escapeHtml(index.version)})</p>
${sections}
</body>
</html>`;
}

function indexNotFound() {
	return { error: { code: "INDEX_NOT_FOUND", message: "No ecosystem index has been generated yet" } };
}

export function createApp(options: AppOptions): Hono {
	const app = new Hono();
	const title = options.title ?? "Ecosystem Index";

	// Middleware
	app.use("*", cors());
	if (options.logRequests ?? true) app.use("*", logger());

	app.get("/health", (c) => {
		return c.json({ status: "ok", version: APP_VERSION });
	});

	app.get("/api/v1/index", (c) => {
		const index = options.loadIndex();
		if (!index) return c.json(indexNotFound(), 404);
		return c.json(index);
	});

	app.get("/api/v1/layers", (c) => {
		const index = options.loadIndex();
		if (!index) return c.json(indexNotFound(), 404);
		return c.json(index.layers);
	});

	app.get("/api/v1/repos/:name", (c) => {
		const index = options.loadIndex();
		if (!index) return c.json(indexNotFound(), 404);
		const name = c.req.param("name");
		const repo = index.repos.find((r) => r.name === name);
		if (!repo) {
			return c.json({ error: { code: "REPO_NOT_FOUND", message: `Unknown repository: ${name}` } }, 404);
		}
		return c.json(repo);
	});

	app.get("/api/v1/audit", (c) => {
		return c.json(toAuditDocument(options.runAudit()));
	});

	app.get("/", (c) => {
		const index = options.loadIndex();
		if (!index) return c.text("No ecosystem index has been generated yet", 404);
		return c.html(renderOverview(index, title));
	});

	// Global error handler
	app.onError((err, c) => {
		console.error(`[ERROR] ${err.message}`, err.stack);
		return c.json(
			{
				error: {
					code: "INTERNAL_ERROR",
					message: options.production ? "An internal error occurred" : err.message,
				},
			},
			500,
		);
	});

	// 404 handler for API
	app.notFound((c) => {
		if (c.req.path.startsWith("/api/")) {
			return c.json({ error: { code: "NOT_FOUND", message: "Endpoint not found" } }, 404);
		}
		return c.text("Not Found", 404);
	});

	return app;
}
