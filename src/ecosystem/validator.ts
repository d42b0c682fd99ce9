// metadata.yml validator
// Collects every problem of a file instead of stopping at the first one

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { load as loadYaml } from "js-yaml";
import { errorMessage, isRecord } from "../lib/utils.js";
import { listRepositoryDirs } from "./builder.js";
import type { MetadataValidationResult, ValidationSummary } from "./types.js";
import { LAYERS, STATUSES } from "./types.js";

export const REQUIRED_FIELDS = [
	"name",
	"layer",
	"status",
	"short_description",
	"dependencies",
	"license",
	"tags",
	"spec_version",
] as const;

export const MAX_DESCRIPTION_LENGTH = 150;

const VALID_LAYERS = new Set<unknown>(LAYERS);
const VALID_STATUSES = new Set<unknown>(STATUSES);

function formatList(values: readonly string[]): string {
	return `[${values.map((v) => `'${v}'`).join(", ")}]`;
}

/** Check an already parsed metadata document */
export function validateMetadata(data: unknown, knownRepos: ReadonlySet<string>): string[] {
	if (!isRecord(data)) return ["metadata.yml must be a YAML object"];

	const errors: string[] = [];

	for (const field of REQUIRED_FIELDS) {
		if (!(field in data)) errors.push(`Missing required field: ${field}`);
	}

	if ("layer" in data && !VALID_LAYERS.has(data.layer)) {
		errors.push(`Invalid layer '${String(data.layer)}'. Must be one of: ${formatList(LAYERS)}`);
	}

	if ("status" in data && !VALID_STATUSES.has(data.status)) {
		errors.push(`Invalid status '${String(data.status)}'. Must be one of: ${formatList(STATUSES)}`);
	}

	if ("short_description" in data) {
		const desc = String(data.short_description ?? "").trim();
		if (desc.length > MAX_DESCRIPTION_LENGTH) {
			errors.push(`short_description exceeds ${MAX_DESCRIPTION_LENGTH} chars (${desc.length} chars)`);
		}
	}

	if ("dependencies" in data && data.dependencies !== null) {
		if (!Array.isArray(data.dependencies)) {
			errors.push("dependencies must be a list");
		} else if (knownRepos.size > 0) {
			for (const dep of data.dependencies) {
				if (!knownRepos.has(String(dep))) errors.push(`Unknown dependency: ${String(dep)}`);
			}
		}
	}

	if ("tags" in data && !Array.isArray(data.tags)) {
		errors.push("tags must be a list");
	}

	return errors;
}

/** Read, parse and check one metadata file */
export function validateMetadataFile(path: string, knownRepos: ReadonlySet<string>): string[] {
	let data: unknown;
	try {
		data = loadYaml(readFileSync(path, "utf-8"));
	} catch (err) {
		return [`YAML parse error: ${errorMessage(err)}`];
	}
	return validateMetadata(data, knownRepos);
}

/** Validate the metadata file of every repository under rootDir that has one */
export function validateRepositories(
	rootDir: string,
	knownRepos: ReadonlySet<string>,
	metadataFile = "metadata.yml",
): ValidationSummary {
	const results: MetadataValidationResult[] = [];

	if (existsSync(rootDir)) {
		for (const name of listRepositoryDirs(rootDir)) {
			const path = join(rootDir, name, metadataFile);
			if (!existsSync(path)) continue;
			results.push({ name, errors: validateMetadataFile(path, knownRepos) });
		}
	}

	const failed = results.filter((r) => r.errors.length > 0).map((r) => r.name);
	const totalErrors = results.reduce((sum, r) => sum + r.errors.length, 0);

	return { results, checked: results.length, totalErrors, failed };
}
