/**
 * Rule tables: the ordered, fixed configuration data used by the attribute
 * resolver and the content analyzers. Loaded once per process from the JSON
 * files under data/ and passed explicitly to whatever needs them.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod/v4";
import { LAYERS } from "../ecosystem/types.js";

/** Directory holding the bundled rule tables and the default inventory */
export const DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));

function isValidRegex(source: string): boolean {
	try {
		new RegExp(source);
		return true;
	} catch {
		return false;
	}
}

const regexSource = z.string().min(1).refine(isValidRegex, "Invalid regular expression");

const ecosystemRulesSchema = z.object({
	metadataFile: z.string().min(1),
	readmeCandidates: z.array(z.string().min(1)).min(1),
	readmePrefixChars: z.number().int().positive(),
	descriptionMaxLength: z.number().int().positive(),
	repositoryUrlBase: z.string(),
	ecosystemTag: z.string().min(1),
	/** `{name}` is replaced with the repository name */
	descriptionTemplate: z.string().min(1),
	defaultLayer: z.enum(LAYERS),
	/** Ordered table: earlier layers win when several entries are contained in a name */
	layerPatterns: z.array(
		z.object({
			layer: z.enum(LAYERS),
			names: z.array(z.string().min(1)),
		}),
	),
	stableNames: z.array(z.string()),
	/** A repository whose name starts with (or equals) one of these is not part of the ecosystem */
	excludePatterns: z.array(z.string().min(1)),
});

const auditRulesSchema = z.object({
	brandingPatterns: z.array(
		z.object({
			pattern: regexSource,
			message: z.string().min(1),
		}),
	),
	titleGlyph: z.object({
		extensions: z.array(z.string().startsWith(".")),
		glyph: z.string().min(1),
		/** `{glyph}` is replaced with the required glyph */
		message: z.string().min(1),
	}),
	statPatterns: z.array(
		z.object({
			pattern: regexSource,
			stat: z.string().min(1),
			/** null marks a statistic that is intentionally left dynamic */
			expected: z.number().int().nullable(),
		}),
	),
	datePatterns: z.array(regexSource),
	currentYearToken: z.string().min(1),
	staleDateMessage: z.string().min(1),
	brandingFiles: z.array(z.string().min(1)),
	freshnessFiles: z.array(z.string().min(1)),
	linkGlob: z.string().min(1),
	ignoredDirs: z.array(z.string().min(1)),
	requiredFiles: z.array(z.string().min(1)),
});

export type EcosystemRules = Readonly<z.infer<typeof ecosystemRulesSchema>>;
export type AuditRules = Readonly<z.infer<typeof auditRulesSchema>>;

function readRulesFile<T>(path: string, schema: z.ZodType<T>): T {
	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(path, "utf-8"));
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		throw new Error(`Cannot read rules file ${path}: ${message}`);
	}

	const result = schema.safeParse(raw);
	if (!result.success) {
		throw new Error(`Invalid rules file ${path}:\n${z.prettifyError(result.error)}`);
	}
	return result.data;
}

export function loadEcosystemRules(path: string = join(DATA_DIR, "ecosystem-rules.json")): EcosystemRules {
	return readRulesFile(path, ecosystemRulesSchema);
}

export function loadAuditRules(path: string = join(DATA_DIR, "audit-rules.json")): AuditRules {
	return readRulesFile(path, auditRulesSchema);
}
