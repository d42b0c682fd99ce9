/**
 * Attribute resolution for a single repository.
 *
 * Every attribute is resolved on its own through the same ordered sources:
 * metadata.yml, then markers in the README, then name heuristics. A source
 * either yields a value (tagged with its provenance) or stays unresolved, and
 * {@link firstResolved} picks the first value in precedence order.
 */

import { load as loadYaml } from "js-yaml";
import type { EcosystemRules } from "../lib/rules.js";
import { isRecord } from "../lib/utils.js";
import type { SourceReader } from "./source.js";
import type { AttributeName, Layer, Provenance, ResolvedAttributes, Status } from "./types.js";

export type Resolution<T> =
	| { readonly kind: "resolved"; readonly value: T; readonly source: Provenance }
	| { readonly kind: "unresolved" };

export interface Resolved<T> {
	readonly value: T;
	readonly source: Provenance;
}

export const UNRESOLVED: Resolution<never> = { kind: "unresolved" };

export function resolved<T>(value: T, source: Provenance): Resolution<T> {
	return { kind: "resolved", value, source };
}

export function firstResolved<T>(candidates: readonly Resolution<T>[], fallback: () => T): Resolved<T> {
	for (const candidate of candidates) {
		if (candidate.kind === "resolved") return { value: candidate.value, source: candidate.source };
	}
	return { value: fallback(), source: "heuristic" };
}

// --- Structured metadata ---

export type MetadataMap = Record<string, unknown>;

/**
 * Parse the repository's metadata file. A file that is missing, unreadable,
 * unparseable or not a mapping counts as absent.
 */
export function readMetadata(source: SourceReader, file: string): MetadataMap | null {
	if (!source.exists(file)) return null;
	try {
		const data = loadYaml(source.readText(file));
		return isRecord(data) ? data : null;
	} catch {
		return null;
	}
}

function asText(value: unknown): string {
	if (value === null || value === undefined) return "";
	return String(value);
}

function asStringArray(value: unknown): string[] {
	if (value === null || value === undefined) return [];
	if (Array.isArray(value)) return value.map(String);
	return [String(value)];
}

function fromMetadata<T>(metadata: MetadataMap | null, key: string, convert: (value: unknown) => T): Resolution<T> {
	if (!metadata || !(key in metadata)) return UNRESOLVED;
	return resolved(convert(metadata[key]), "metadata");
}

// --- README markers ---

export interface ReadmeInfo {
	readonly hasReadme: boolean;
	readonly layer?: string;
	readonly status?: string;
	readonly description?: string;
}

const LAYER_MARKER = /\*\*Layer:\*\*\s*(\w+)/i;
const STATUS_MARKER = /\*\*Status:\*\*\s*(\w+)/i;

export function parseReadme(content: string, descriptionMaxLength: number): Omit<ReadmeInfo, "hasReadme"> {
	const layer = LAYER_MARKER.exec(content)?.[1]?.toLowerCase();
	const status = STATUS_MARKER.exec(content)?.[1]?.toLowerCase();

	const firstLine = content.trim().split("\n")[0] ?? "";
	const title = firstLine.replace(/^[# ]+|[# ]+$/g, "").trim();
	const description = title && title.length < descriptionMaxLength ? title : undefined;

	return { layer, status, description };
}

/** Markers from the first README candidate that exists and can be read */
export function extractReadmeInfo(source: SourceReader, rules: EcosystemRules): ReadmeInfo {
	for (const candidate of rules.readmeCandidates) {
		if (!source.exists(candidate)) continue;
		let content: string;
		try {
			content = source.readText(candidate, rules.readmePrefixChars);
		} catch {
			continue;
		}
		return { hasReadme: true, ...parseReadme(content, rules.descriptionMaxLength) };
	}
	return { hasReadme: false };
}

function fromReadme(value: string | undefined): Resolution<string> {
	return value === undefined ? UNRESOLVED : resolved(value, "readme");
}

// --- Name heuristics ---

/** An exact name match anywhere in the table beats a substring match */
export function guessLayer(name: string, rules: EcosystemRules): Layer {
	const lower = name.toLowerCase();
	for (const { layer, names } of rules.layerPatterns) {
		if (names.some((pattern) => pattern.toLowerCase() === lower)) return layer;
	}
	for (const { layer, names } of rules.layerPatterns) {
		if (names.some((pattern) => lower.includes(pattern.toLowerCase()))) return layer;
	}
	return rules.defaultLayer;
}

export function guessStatus(name: string, rules: EcosystemRules): Status {
	const lower = name.toLowerCase();
	if (lower.includes("prototype") || lower.includes("demo")) return "alpha";
	if (lower.includes("example")) return "beta";
	if (rules.stableNames.includes(name)) return "stable";
	return "beta";
}

export function isEcosystemRepository(name: string, rules: EcosystemRules): boolean {
	return !rules.excludePatterns.some((pattern) => name.startsWith(pattern) || name === pattern);
}

// --- Cascade ---

export function resolveAttributes(source: SourceReader, name: string, rules: EcosystemRules): ResolvedAttributes {
	const metadata = readMetadata(source, rules.metadataFile);
	const readme = extractReadmeInfo(source, rules);

	const layer = firstResolved([fromMetadata(metadata, "layer", asText), fromReadme(readme.layer)], () =>
		guessLayer(name, rules),
	);
	const status = firstResolved([fromMetadata(metadata, "status", asText), fromReadme(readme.status)], () =>
		guessStatus(name, rules),
	);
	const description = firstResolved(
		[fromMetadata(metadata, "short_description", asText), fromReadme(readme.description)],
		() => rules.descriptionTemplate.replaceAll("{name}", name),
	);
	const dependencies = firstResolved([fromMetadata(metadata, "dependencies", asStringArray)], () => []);
	const tags = firstResolved([fromMetadata(metadata, "tags", asStringArray)], () => [
		layer.value,
		rules.ecosystemTag,
	]);

	const provenance: Record<AttributeName, Provenance> = {
		layer: layer.source,
		status: status.source,
		description: description.source,
		dependencies: dependencies.source,
		tags: tags.source,
	};

	return {
		layer: layer.value,
		status: status.value,
		description: description.value,
		dependencies: dependencies.value,
		tags: tags.value,
		hasMetadata: metadata !== null,
		hasReadme: readme.hasReadme,
		provenance,
	};
}
