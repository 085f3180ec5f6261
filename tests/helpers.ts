import { vi } from "vitest";
import type { Logger } from "../src/types/logger.js";

/**
 * Writes the asar layout directly from header JSON text, independent of the codec.
 */
export function buildRawAsar(jsonText: string, data: Buffer | string = ""): Buffer {
	const json = Buffer.from(jsonText, "utf8");
	const aligned = json.length + ((4 - (json.length % 4)) % 4);
	const prefix = Buffer.alloc(16 + aligned);
	prefix.writeUInt32LE(4, 0);
	prefix.writeUInt32LE(aligned + 8, 4);
	prefix.writeUInt32LE(aligned + 4, 8);
	prefix.writeUInt32LE(json.length, 12);
	json.copy(prefix, 16);
	return Buffer.concat([
		prefix,
		typeof data === "string" ? Buffer.from(data, "utf8") : data,
	]);
}

export function buildAsar(header: unknown, data: Buffer | string = ""): Buffer {
	return buildRawAsar(JSON.stringify(header), data);
}

type HeaderDirectory = { files: Record<string, unknown> };

/**
 * Packs `[path, content]` pairs contiguously, in the given order.
 */
export function packFiles(files: ReadonlyArray<readonly [string, string | Buffer]>): Buffer {
	const root: HeaderDirectory = { files: {} };
	const directories = new Map<string, HeaderDirectory>([["", root]]);
	const chunks: Buffer[] = [];
	let offset = 0;
	for (const [path, content] of files) {
		const bytes = typeof content === "string" ? Buffer.from(content, "utf8") : content;
		const parts = path.split("/");
		const name = parts.pop() ?? path;
		let directory = root;
		let prefix = "";
		for (const part of parts) {
			prefix = prefix === "" ? part : `${prefix}/${part}`;
			let child = directories.get(prefix);
			if (!child) {
				child = { files: {} };
				directory.files[part] = child;
				directories.set(prefix, child);
			}
			directory = child;
		}
		directory.files[name] = { size: bytes.length, offset: String(offset) };
		chunks.push(bytes);
		offset += bytes.length;
	}
	return buildAsar(root, Buffer.concat(chunks));
}

export function silentLogger() {
	return { log: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

export const HOST_SCRIPT = [
	"function createMainWindow(mainWindow) {",
	"  mainWindow.webContents.on('did-finish-load', () => setReady(true));",
	"  return mainWindow;",
	"}",
	"",
].join("\n");
