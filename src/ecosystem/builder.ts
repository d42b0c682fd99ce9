/**
 * Builds the ecosystem index from a directory of repositories.
 *
 * Runs in two phases: construction (one record per directory, reverse
 * dependencies empty), then graph linking, which only appends to each
 * record's `reverseDependencies`. Layer summaries are computed last.
 */

import { existsSync, readdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod/v4";
import type { EcosystemRules } from "../lib/rules.js";
import { isEcosystemRepository, resolveAttributes } from "./resolver.js";
import { FileSystemSource, entryKind } from "./source.js";
import type {
	IndexBuildResult,
	IndexDocument,
	IndexDocumentOptions,
	IndexedRepository,
	Layer,
	LayerSummary,
	RepositoryRecord,
} from "./types.js";
import { LAYERS } from "./types.js";

/** Immediate, non-hidden subdirectories (links to directories included) in lexicographic order */
export function listRepositoryDirs(rootDir: string): string[] {
	return readdirSync(rootDir, { withFileTypes: true })
		.filter((entry) => !entry.name.startsWith(".") && entryKind(rootDir, entry) === "directory")
		.map((entry) => entry.name)
		.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function buildRecord(rootDir: string, name: string, rules: EcosystemRules): RepositoryRecord {
	const localPath = join(rootDir, name);
	const attributes = resolveAttributes(new FileSystemSource(localPath), name, rules);
	const urlBase = rules.repositoryUrlBase.replace(/\/+$/, "");

	return {
		name,
		url: urlBase ? `${urlBase}/${name}` : "",
		localPath,
		visibility: "public",
		layer: attributes.layer,
		status: attributes.status,
		shortDescription: attributes.description,
		dependencies: attributes.dependencies,
		tags: attributes.tags,
		reverseDependencies: [],
		hasMetadata: attributes.hasMetadata,
		hasReadme: attributes.hasReadme,
		isEcosystem: isEcosystemRepository(name, rules),
		provenance: attributes.provenance,
	};
}

/**
 * Append each record's name to the reverse dependencies of every record it
 * depends on. Names outside the set are ignored; a dependency declared twice
 * produces two entries.
 */
export function linkReverseDependencies(records: readonly RepositoryRecord[]): void {
	const byName = new Map<string, RepositoryRecord>();
	for (const record of records) byName.set(record.name, record);

	for (const record of records) {
		for (const dep of record.dependencies) {
			byName.get(dep)?.reverseDependencies.push(record.name);
		}
	}
}

export function summarizeLayers(records: readonly RepositoryRecord[]): LayerSummary[] {
	return LAYERS.map((layer) => {
		const repos = records.filter((r) => r.layer === layer).map((r) => r.name);
		return { layer, count: repos.length, repos };
	});
}

export function buildIndex(rootDir: string, rules: EcosystemRules): IndexBuildResult {
	if (!existsSync(rootDir) || !statSync(rootDir).isDirectory()) {
		return {
			records: [],
			all: [],
			layers: summarizeLayers([]),
			diagnostics: [`Repository root not found: ${rootDir}`],
		};
	}

	const all = listRepositoryDirs(rootDir).map((name) => buildRecord(rootDir, name, rules));
	const records = all.filter((r) => r.isEcosystem);

	linkReverseDependencies(records);

	const diagnostics: string[] = [];
	const excluded = all.length - records.length;
	if (excluded > 0) diagnostics.push(`Excluded ${excluded} non-ecosystem repositories`);

	return { records, all, layers: summarizeLayers(records), diagnostics };
}

// --- Published index document ---

export function serializeRecord(record: RepositoryRecord): IndexedRepository {
	return {
		name: record.name,
		url: record.url,
		local_path: record.localPath,
		has_metadata: record.hasMetadata,
		has_readme: record.hasReadme,
		is_ecosystem: record.isEcosystem,
		layer: record.layer,
		status: record.status,
		short_description: record.shortDescription,
		dependencies: record.dependencies,
		tags: record.tags,
		visibility: record.visibility,
		reverse_dependencies: record.reverseDependencies,
	};
}

export function createIndexDocument(
	result: IndexBuildResult,
	options: IndexDocumentOptions,
	now: Date = new Date(),
): IndexDocument {
	const byLayer = new Map(result.layers.map((summary): [Layer, LayerSummary] => [summary.layer, summary]));
	const entry = (layer: Layer) => {
		const summary = byLayer.get(layer);
		return { count: summary?.count ?? 0, repos: summary?.repos ?? [] };
	};

	return {
		version: options.version,
		generated: now.toISOString(),
		total_repos: options.totalRepos,
		local_repos: result.all.length,
		public_repos: options.publicRepos,
		private_repos: options.privateRepos,
		repos: result.records.map(serializeRecord),
		layers: {
			protocol: entry("protocol"),
			language: entry("language"),
			runtime: entry("runtime"),
			application: entry("application"),
			infrastructure: entry("infrastructure"),
			research: entry("research"),
		},
	};
}

export function writeIndexDocument(path: string, document: IndexDocument): void {
	writeFileSync(path, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
}

const layerEntrySchema = z.object({
	count: z.number().int().nonnegative(),
	repos: z.array(z.string()),
});

const indexDocumentSchema = z.object({
	version: z.string(),
	generated: z.string(),
	total_repos: z.number(),
	local_repos: z.number(),
	public_repos: z.number(),
	private_repos: z.number(),
	repos: z.array(
		z.object({
			name: z.string(),
			url: z.string().default(""),
			local_path: z.string().default(""),
			has_metadata: z.boolean().default(false),
			has_readme: z.boolean().default(false),
			is_ecosystem: z.boolean().default(true),
			layer: z.string(),
			status: z.string(),
			short_description: z.string().default(""),
			dependencies: z.array(z.string()).default([]),
			tags: z.array(z.string()).default([]),
			visibility: z.string().default("public"),
			reverse_dependencies: z.array(z.string()).default([]),
		}),
	),
	layers: z.object({
		protocol: layerEntrySchema,
		language: layerEntrySchema,
		runtime: layerEntrySchema,
		application: layerEntrySchema,
		infrastructure: layerEntrySchema,
		research: layerEntrySchema,
	}),
});

/** Read a previously written index; throws if it is missing or malformed */
export function readIndexDocument(path: string): IndexDocument {
	const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
	const result = indexDocumentSchema.safeParse(raw);
	if (!result.success) {
		throw new Error(`Invalid index document ${path}:\n${z.prettifyError(result.error)}`);
	}
	return result.data;
}

/** Names listed in an index document, or an empty set when there is none yet */
export function loadKnownRepositories(path: string): Set<string> {
	if (!existsSync(path)) return new Set();
	return new Set(readIndexDocument(path).repos.map((r) => r.name));
}
