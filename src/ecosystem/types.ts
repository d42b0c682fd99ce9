export const LAYERS = [
	"protocol",
	"language",
	"runtime",
	"application",
	"infrastructure",
	"research",
] as const;

export type Layer = (typeof LAYERS)[number];

export const STATUSES = ["alpha", "beta", "stable", "archived", "deprecated"] as const;

export type Status = (typeof STATUSES)[number];

/** Where a resolved attribute came from, highest precedence first */
export type Provenance = "metadata" | "readme" | "heuristic";

export type AttributeName = "layer" | "status" | "description" | "dependencies" | "tags";

/**
 * Resolved descriptive attributes for one repository.
 *
 * Values taken from metadata.yml are used verbatim, so `layer` and `status`
 * are plain strings here; conformance to {@link Layer} and {@link Status} is
 * checked by the metadata validator.
 */
export interface ResolvedAttributes {
	readonly layer: string;
	readonly status: string;
	readonly description: string;
	readonly dependencies: readonly string[];
	readonly tags: readonly string[];
	readonly hasMetadata: boolean;
	readonly hasReadme: boolean;
	readonly provenance: Readonly<Record<AttributeName, Provenance>>;
}

/** One scanned repository directory */
export interface RepositoryRecord {
	readonly name: string;
	readonly url: string;
	readonly localPath: string;
	readonly visibility: "public";
	readonly layer: string;
	readonly status: string;
	readonly shortDescription: string;
	readonly dependencies: readonly string[];
	readonly tags: readonly string[];
	/** Filled by the linking phase only, after every record is constructed */
	readonly reverseDependencies: string[];
	readonly hasMetadata: boolean;
	readonly hasReadme: boolean;
	readonly isEcosystem: boolean;
	readonly provenance: Readonly<Record<AttributeName, Provenance>>;
}

export interface LayerSummary {
	readonly layer: Layer;
	readonly count: number;
	readonly repos: readonly string[];
}

export interface IndexBuildResult {
	/** Ecosystem records with reverse dependencies linked */
	readonly records: readonly RepositoryRecord[];
	/** Every scanned directory, excluded ones included */
	readonly all: readonly RepositoryRecord[];
	readonly layers: readonly LayerSummary[];
	readonly diagnostics: readonly string[];
}

/** Repository entry as written to ecosystem-index.json */
export interface IndexedRepository {
	readonly name: string;
	readonly url: string;
	readonly local_path: string;
	readonly has_metadata: boolean;
	readonly has_readme: boolean;
	readonly is_ecosystem: boolean;
	readonly layer: string;
	readonly status: string;
	readonly short_description: string;
	readonly dependencies: readonly string[];
	readonly tags: readonly string[];
	readonly visibility: string;
	readonly reverse_dependencies: readonly string[];
}

export interface IndexDocument {
	readonly version: string;
	readonly generated: string;
	readonly total_repos: number;
	readonly local_repos: number;
	readonly public_repos: number;
	readonly private_repos: number;
	readonly repos: readonly IndexedRepository[];
	readonly layers: Readonly<Record<Layer, { readonly count: number; readonly repos: readonly string[] }>>;
}

/** Externally supplied values for the published index */
export interface IndexDocumentOptions {
	readonly version: string;
	readonly totalRepos: number;
	readonly publicRepos: number;
	readonly privateRepos: number;
}

export interface MetadataValidationResult {
	readonly name: string;
	readonly errors: readonly string[];
}

export interface ValidationSummary {
	readonly results: readonly MetadataValidationResult[];
	readonly checked: number;
	readonly totalErrors: number;
	readonly failed: readonly string[];
}
