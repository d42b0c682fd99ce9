import { afterEach, describe, expect, it, vi } from "vitest";

import { loadConfig } from "../../src/lib/config.js";

afterEach(() => {
	vi.restoreAllMocks();
});

describe("loadConfig", () => {
	it("should apply defaults", () => {
		const config = loadConfig({});
		expect(config.PORT).toBe(3000);
		expect(config.NODE_ENV).toBe("development");
		expect(config.ECOSYSTEM_INDEX_PATH).toBe("ecosystem-index.json");
		expect(config.ECOSYSTEM_INDEX_VERSION).toBe("2026-01");
		expect(config.ECOSYSTEM_TOTAL_REPOS).toBe(0);
	});

	it("should coerce numeric variables", () => {
		const config = loadConfig({ ECOSYSTEM_TOTAL_REPOS: "88", PORT: "8080" });
		expect(config.ECOSYSTEM_TOTAL_REPOS).toBe(88);
		expect(config.PORT).toBe(8080);
	});

	it("should reject invalid values", () => {
		vi.spyOn(console, "error").mockImplementation(() => {});
		expect(() => loadConfig({ PORT: "not-a-port" })).toThrow("Invalid environment configuration");
		expect(() => loadConfig({ ECOSYSTEM_PUBLIC_REPOS: "-1" })).toThrow("Invalid environment configuration");
	});
});
