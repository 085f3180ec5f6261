import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AsarBinary } from "../src/asar-binary.js";
import { DEFAULT_INJECTION_CONFIG } from "../src/constants/injection-defaults.js";
import { extractPayload } from "../src/injection.js";
import { fileExists } from "../src/archive-io.js";
import { applyTheme, removeTheme, restoreTheme } from "../src/workflow.js";
import { HOST_SCRIPT, packFiles, silentLogger } from "./helpers.js";

const ENTRY = "app/mainScreen.js";

function scriptOf(bytes: Buffer): string {
	const archive = AsarBinary.decode({ buffer: bytes });
	return AsarBinary.readEntry({ archive, path: ENTRY }).toString("utf8");
}

describe("theme workflows", () => {
	let dir: string;
	let archivePath: string;
	let original: Buffer;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "asar-inject-workflow-"));
		archivePath = join(dir, "app.asar");
		original = packFiles([
			["package.json", '{"main":"app/mainScreen.js"}'],
			[ENTRY, HOST_SCRIPT],
		]);
		await writeFile(archivePath, original);
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	describe("applyTheme", () => {
		it("patches the archive and backs up the original first", async () => {
			const logger = silentLogger();

			const status = await applyTheme({ archivePath, css: "a::after { content: `x`; }", logger });

			expect(status).toBe("patched");
			expect(await readFile(`${archivePath}.backup`)).toEqual(original);
			const payload = extractPayload(scriptOf(await readFile(archivePath)), DEFAULT_INJECTION_CONFIG);
			expect(payload).toEqual({ css: "a::after { content: `x`; }", js: "" });
			expect(logger.log).toHaveBeenCalledWith(`Backup written to: ${archivePath}.backup`);
		});

		it("leaves an already patched archive alone", async () => {
			await applyTheme({ archivePath, css: "body{}", logger: silentLogger() });
			const once = await readFile(archivePath);
			const logger = silentLogger();

			const status = await applyTheme({ archivePath, css: "p{}", logger });

			expect(status).toBe("already-patched");
			expect(await readFile(archivePath)).toEqual(once);
			expect(logger.warn).toHaveBeenCalledWith(
				`${ENTRY} already contains an injected theme; pass --reapply to replace it`,
			);
		});

		it("keeps the first backup when reapplying", async () => {
			await applyTheme({ archivePath, css: "body{}", logger: silentLogger() });
			const logger = silentLogger();

			await applyTheme({ archivePath, css: "p{}", reapply: true, logger });

			expect(await readFile(`${archivePath}.backup`)).toEqual(original);
			expect(logger.log).toHaveBeenCalledWith(`Backup ${archivePath}.backup already exists, keeping it`);
		});

		it("skips the backup when disabled", async () => {
			await applyTheme({ archivePath, css: "body{}", makeBackup: false, logger: silentLogger() });

			expect(await fileExists(`${archivePath}.backup`)).toBe(false);
		});

		it("writes nothing when the script has no anchor", async () => {
			const bare = packFiles([[ENTRY, "module.exports = {};\n"]]);
			await writeFile(archivePath, bare);

			await expect(applyTheme({ archivePath, css: "body{}", logger: silentLogger() })).rejects.toMatchObject({
				code: "AnchorNotFound",
			});
			expect(await readFile(archivePath)).toEqual(bare);
			expect(await fileExists(`${archivePath}.backup`)).toBe(false);
		});
	});

	describe("removeTheme", () => {
		it("restores the unpatched bytes", async () => {
			await applyTheme({ archivePath, css: "body{}", js: "init();", logger: silentLogger() });

			expect(await removeTheme({ archivePath, logger: silentLogger() })).toBe("unpatched");
			expect(await readFile(archivePath)).toEqual(original);
		});

		it("reports archives without a theme", async () => {
			const logger = silentLogger();

			expect(await removeTheme({ archivePath, logger })).toBe("not-patched");
			expect(logger.warn).toHaveBeenCalledWith(`${ENTRY} has no injected theme`);
		});
	});

	describe("restoreTheme", () => {
		it("copies the backup back", async () => {
			await applyTheme({ archivePath, css: "body{}", logger: silentLogger() });

			await restoreTheme({ archivePath, logger: silentLogger() });

			expect(await readFile(archivePath)).toEqual(original);
		});
	});
});
