import { readFileSync } from "node:fs";
import { z } from "zod/v4";
import { errorMessage } from "../lib/utils.js";
import type { Inventory } from "./types.js";

const inventorySchema = z.object({
	branding: z.record(z.string(), z.unknown()).default({}),
	repos: z.record(z.string(), z.array(z.string())),
});

export function parseInventory(data: unknown, source = "inventory"): Inventory {
	const result = inventorySchema.safeParse(data);
	if (!result.success) {
		throw new Error(`Invalid ${source}:\n${z.prettifyError(result.error)}`);
	}
	return result.data;
}

/**
 * Load the inventory that scopes an audit. There is no fallback: a missing or
 * malformed inventory aborts the run.
 */
export function loadInventory(path: string): Inventory {
	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(path, "utf-8"));
	} catch (err) {
		throw new Error(`Cannot read inventory ${path}: ${errorMessage(err)}`);
	}
	return parseInventory(raw, `inventory ${path}`);
}

/** Glyph override from the inventory's branding tokens, if it names one */
export function brandingGlyph(inventory: Inventory): string | undefined {
	const glyph = inventory.branding["glyph"];
	return typeof glyph === "string" && glyph.length > 0 ? glyph : undefined;
}
