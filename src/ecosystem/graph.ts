/**
 * Diagram renderings of a published index: a Mermaid definition and a
 * standalone SVG with one column per layer.
 */

import type { IndexDocument, Layer } from "./types.js";
import { LAYERS } from "./types.js";

export const LAYER_COLORS: Readonly<Record<Layer, string>> = {
	protocol: "#3B82F6",
	language: "#22C55E",
	runtime: "#A855F7",
	application: "#F97316",
	infrastructure: "#14B8A6",
	research: "#EAB308",
};

const MERMAID_REPOS_PER_LAYER = 8;
const SVG_REPOS_PER_LAYER = 10;

export function mermaidId(name: string): string {
	return name.replace(/[^A-Za-z0-9_]/g, "_");
}

function escapeXml(s: string): string {
	return s
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;");
}

/** Node label in Mermaid's quoted form; `#quot;` is its entity for a double quote. */
function mermaidLabel(name: string): string {
	return `"${name.replace(/"/g, "#quot;")}"`;
}

export function generateMermaid(index: IndexDocument): string {
	const lines = ["graph TB"];
	// Distinct names can sanitize to the same id; later ones get a numeric suffix.
	const ids = new Map<string, string>();
	const taken = new Set<string>();

	for (const layer of LAYERS) {
		const repos = index.layers[layer].repos;
		if (repos.length === 0) continue;

		lines.push(`    subgraph ${layer.toUpperCase()}`);
		for (const repo of repos.slice(0, MERMAID_REPOS_PER_LAYER)) {
			const base = mermaidId(repo);
			let id = base;
			for (let n = 2; taken.has(id); n++) id = `${base}_${n}`;
			taken.add(id);
			ids.set(repo, id);
			lines.push(`        ${id}[${mermaidLabel(repo)}]`);
		}
		lines.push("    end");
	}

	for (const repo of index.repos) {
		const from = ids.get(repo.name);
		if (from === undefined) continue;
		for (const dep of repo.dependencies) {
			const to = ids.get(dep);
			if (to !== undefined) lines.push(`    ${from} --> ${to}`);
		}
	}

	return lines.join("\n");
}

export function displayName(name: string): string {
	return name.length < 20 ? name : `${name.slice(0, 17)}...`;
}

export function generateSvg(index: IndexDocument, title: string): string {
	const width = 1200;
	const height = 800;
	const columnWidth = Math.floor(width / LAYERS.length);
	const yStart = 100;
	const layerCount = LAYERS.filter((layer) => index.layers[layer].count > 0).length;

	const parts = [
		`<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${width} ${height}">`,
		"<style>",
		"  .layer-label { font: bold 14px sans-serif; fill: #374151; }",
		"  .repo-label { font: 11px sans-serif; fill: #1F2937; }",
		"  .repo-box { rx: 6; ry: 6; stroke: #E5E7EB; stroke-width: 1; }",
		"  .legend-text { font: 12px sans-serif; fill: #374151; }",
		"</style>",
		'<rect width="100%" height="100%" fill="#F9FAFB"/>',
		`<text x="${width / 2}" y="40" text-anchor="middle" style="font: bold 24px sans-serif; fill: #111827;">${escapeXml(title)}</text>`,
		`<text x="${width / 2}" y="65" text-anchor="middle" style="font: 14px sans-serif; fill: #6B7280;">${index.repos.length} repositories | ${layerCount} layers</text>`,
	];

	LAYERS.forEach((layer, i) => {
		const x = i * columnWidth + 20;
		const inner = columnWidth - 40;
		const center = x + Math.floor(inner / 2);
		const { count, repos } = index.layers[layer];
		const color = LAYER_COLORS[layer];

		parts.push(`<!-- ${layer.toUpperCase()} -->`);
		parts.push(`<rect x="${x}" y="${yStart}" width="${inner}" height="580" fill="${color}15" rx="12"/>`);
		parts.push(
			`<text x="${center}" y="${yStart + 25}" text-anchor="middle" class="layer-label">${layer.toUpperCase()}</text>`,
		);
		parts.push(
			`<text x="${center}" y="${yStart + 45}" text-anchor="middle" style="font: 11px sans-serif; fill: #6B7280;">${count} repos</text>`,
		);

		repos.slice(0, SVG_REPOS_PER_LAYER).forEach((repo, j) => {
			const boxY = yStart + 60 + j * 50;
			parts.push(`<rect x="${x + 10}" y="${boxY}" width="${columnWidth - 60}" height="40" fill="white" class="repo-box"/>`);
			parts.push(`<rect x="${x + 10}" y="${boxY}" width="4" height="40" fill="${color}" rx="2"/>`);
			parts.push(`<text x="${x + 22}" y="${boxY + 25}" class="repo-label">${escapeXml(displayName(repo))}</text>`);
		});

		if (count > SVG_REPOS_PER_LAYER) {
			parts.push(
				`<text x="${center}" y="${yStart + 560}" text-anchor="middle" style="font: 11px sans-serif; fill: #9CA3AF;">+${count - SVG_REPOS_PER_LAYER} more</text>`,
			);
		}
	});

	const legendY = 720;
	parts.push(`<text x="60" y="${legendY}" class="legend-text" style="font-weight: bold;">Layers:</text>`);
	LAYERS.forEach((layer, i) => {
		const lx = 140 + i * 160;
		parts.push(`<rect x="${lx}" y="${legendY - 12}" width="16" height="16" fill="${LAYER_COLORS[layer]}" rx="3"/>`);
		parts.push(`<text x="${lx + 22}" y="${legendY}" class="legend-text">${layer}</text>`);
	});

	parts.push(
		`<text x="${width / 2}" y="${height - 20}" text-anchor="middle" style="font: 11px sans-serif; fill: #9CA3AF;">Generated ${escapeXml(index.generated)} | index version ${escapeXml(index.version)}</text>`,
	);
	parts.push("</svg>");

	return parts.join("\n");
}
