import { existsSync } from "node:fs";
import { dirname } from "node:path";
import type { BrokenLinkFinding, ContentAnalyzer } from "../types.js";

const EXTERNAL_PREFIXES = ["http://", "https://", "mailto:", "#", "javascript:"] as const;

const FENCED_BLOCK = /```[\s\S]*?```/g;
const INLINE_CODE = /`[^`]+`/g;
const HREF_LINK = /href=["']([^"']+)["']/g;
const MARKDOWN_LINK = /\[.*?\]\(([^)]+)\)/g;
const NAV_LINK = /to=["']([^"']+)["']/g;

function captures(text: string, regex: RegExp): string[] {
	return Array.from(text.matchAll(regex), (m) => m[1] ?? "");
}

/** Link targets in document order per syntax: href, then markdown, then `to=` */
export function extractLinks(text: string): string[] {
	const stripped = text.replace(FENCED_BLOCK, "").replace(INLINE_CODE, "");
	return [...captures(stripped, HREF_LINK), ...captures(stripped, MARKDOWN_LINK), ...captures(stripped, NAV_LINK)];
}

function isDegenerate(link: string): boolean {
	return link === ".." || link === "..." || link.includes("|") || link.startsWith(" ") || link.length < 2;
}

/**
 * Link target as the filesystem sees it. Not normalized, so a `..` after a
 * missing directory fails the lookup instead of being collapsed away.
 */
function resolveUnder(baseDir: string, link: string): string {
	return `${baseDir}/${link}`;
}

export type PathExists = (path: string) => boolean;

/**
 * Checks relative links against the filesystem. External URLs and
 * root-relative router paths are accepted as is; anchors are not verified.
 */
export class LinkAnalyzer implements ContentAnalyzer<BrokenLinkFinding> {
	constructor(private readonly exists: PathExists = existsSync) {}

	extractLinks(text: string): string[] {
		return extractLinks(text);
	}

	isValid(link: string, baseDir: string): boolean {
		if (EXTERNAL_PREFIXES.some((prefix) => link.startsWith(prefix))) return true;
		if (link.startsWith("/")) return true;
		if (isDegenerate(link)) return true;

		const hash = link.indexOf("#");
		if (hash !== -1) {
			const filePart = link.slice(0, hash);
			if (!filePart) return true;
			if (this.exists(resolveUnder(baseDir, filePart))) return true;
		}

		return (
			this.exists(resolveUnder(baseDir, link)) ||
			this.exists(resolveUnder(baseDir, link.replaceAll(".html", ".jsx")))
		);
	}

	validate(links: readonly string[], baseDir: string, file: string): BrokenLinkFinding[] {
		const broken: BrokenLinkFinding[] = [];
		for (const link of links) {
			if (this.isValid(link, baseDir)) continue;
			broken.push({ kind: "broken_link", file, link, base: baseDir, message: `Broken link: ${link}` });
		}
		return broken;
	}

	scan(text: string, file: string): readonly BrokenLinkFinding[] {
		return this.validate(this.extractLinks(text), dirname(file), file);
	}
}
