import {
	type Dirent,
	closeSync,
	existsSync,
	openSync,
	readdirSync,
	readFileSync,
	readSync,
	realpathSync,
	statSync,
} from "node:fs";
import { join } from "node:path";

/** Read-only view of one repository directory */
export interface SourceReader {
	readonly root: string;
	/** True when the path (file or directory) exists below the root */
	exists(relativePath: string): boolean;
	/**
	 * Read a file as UTF-8 text, optionally only its first `maxChars` characters.
	 * Throws when the file cannot be read or the part read is not valid UTF-8.
	 */
	readText(relativePath: string, maxChars?: number): string;
	/** Files below the root matching a glob, as sorted root-relative paths with `/` separators */
	enumerate(pattern: string, ignoredDirs?: ReadonlySet<string>): readonly string[];
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Translate a glob into an anchored regular expression.
 * Supports `**` (any number of directories), `*` and `?` within one segment.
 */
export function globToRegExp(pattern: string): RegExp {
	let source = "";
	const segments = pattern.split("/");
	segments.forEach((segment, i) => {
		const last = i === segments.length - 1;
		if (segment === "**") {
			source += last ? ".*" : "(?:[^/]+/)*";
			return;
		}
		for (const ch of segment) {
			if (ch === "*") source += "[^/]*";
			else if (ch === "?") source += "[^/]";
			else source += ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
		}
		if (!last) source += "/";
	});
	return new RegExp(`^${source}$`);
}

function listEntries(path: string): Dirent[] {
	try {
		return readdirSync(path, { withFileTypes: true });
	} catch {
		return [];
	}
}

export type EntryKind = "directory" | "file" | "other";

/** Kind of a directory entry, resolving symbolic links to their target; a dangling link is "other" */
export function entryKind(dir: string, entry: Dirent): EntryKind {
	if (entry.isSymbolicLink()) {
		try {
			const stats = statSync(join(dir, entry.name));
			return stats.isDirectory() ? "directory" : stats.isFile() ? "file" : "other";
		} catch {
			return "other";
		}
	}
	return entry.isDirectory() ? "directory" : entry.isFile() ? "file" : "other";
}

function walkFiles(
	root: string,
	dir: string,
	ignoredDirs: ReadonlySet<string>,
	ancestors: Set<string>,
	out: string[],
): void {
	const absolute = join(root, dir);
	// Linked directories are followed; a link back to an ancestor ends the walk there
	let real: string;
	try {
		real = realpathSync(absolute);
	} catch {
		return;
	}
	if (ancestors.has(real)) return;
	ancestors.add(real);

	const entries = listEntries(absolute);
	entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
	for (const entry of entries) {
		const rel = dir ? `${dir}/${entry.name}` : entry.name;
		const kind = entryKind(absolute, entry);
		if (kind === "directory") {
			if (ignoredDirs.has(entry.name)) continue;
			walkFiles(root, rel, ignoredDirs, ancestors, out);
			continue;
		}
		if (kind === "file") out.push(rel);
	}
	ancestors.delete(real);
}

/**
 * Decode at most `maxChars` characters from the start of a file. Only a
 * bounded byte prefix is read, so bytes past it never affect the result.
 */
function readPrefix(path: string, maxChars: number): string {
	// A UTF-16 code unit never takes more than 4 bytes of UTF-8
	const buffer = Buffer.alloc(maxChars * 4);
	const fd = openSync(path, "r");
	let bytesRead: number;
	try {
		bytesRead = readSync(fd, buffer, 0, buffer.length, 0);
	} finally {
		closeSync(fd);
	}
	// Streaming mode holds back a character cut off at the end of the window
	const decoder = new TextDecoder("utf-8", { fatal: true });
	return decoder.decode(buffer.subarray(0, bytesRead), { stream: true }).slice(0, maxChars);
}

export class FileSystemSource implements SourceReader {
	constructor(readonly root: string) {}

	exists(relativePath: string): boolean {
		return existsSync(join(this.root, relativePath));
	}

	readText(relativePath: string, maxChars?: number): string {
		const path = join(this.root, relativePath);
		return maxChars === undefined ? utf8.decode(readFileSync(path)) : readPrefix(path, maxChars);
	}

	enumerate(pattern: string, ignoredDirs: ReadonlySet<string> = new Set()): readonly string[] {
		const matcher = globToRegExp(pattern);
		const files: string[] = [];
		walkFiles(this.root, "", ignoredDirs, new Set(), files);
		return files.filter((file) => matcher.test(file));
	}
}
