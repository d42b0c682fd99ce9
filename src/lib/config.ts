import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod/v4";
import { DATA_DIR } from "./rules.js";

const envSchema = z.object({
	ECOSYSTEM_REPOS_DIR: z.string().min(1).default(join(homedir(), "repos")),
	ECOSYSTEM_INDEX_PATH: z.string().min(1).default("ecosystem-index.json"),
	ECOSYSTEM_INVENTORY_PATH: z.string().min(1).default(join(DATA_DIR, "inventory.json")),
	ECOSYSTEM_ASSETS_DIR: z.string().min(1).default("assets"),
	ECOSYSTEM_INDEX_VERSION: z.string().min(1).default("2026-01"),
	// Known counts that include repositories which are not cloned locally
	ECOSYSTEM_TOTAL_REPOS: z.coerce.number().int().nonnegative().default(0),
	ECOSYSTEM_PUBLIC_REPOS: z.coerce.number().int().nonnegative().default(0),
	ECOSYSTEM_PRIVATE_REPOS: z.coerce.number().int().nonnegative().default(0),
	NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
	PORT: z.coerce.number().int().positive().default(3000),
});

export type Config = z.infer<typeof envSchema>;

/** Validate configuration from environment variables */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const result = envSchema.safeParse(env);
	if (!result.success) {
		const formatted = z.prettifyError(result.error);
		console.error("❌ Invalid environment variables:\n", formatted);
		throw new Error("Invalid environment configuration");
	}
	return result.data;
}
