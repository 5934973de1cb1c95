// pattern: Imperative Shell
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { Logger } from "pino";
import { buildPlanetDocument } from "./document";
import type { Renderer } from "./document";

/**
 * Creates a renderer that writes the planet as one JSON document.
 *
 * The document is written beside the target and renamed over it, so readers
 * of `outputPath` only ever see a complete file.
 */
export function createJsonRenderer(outputPath: string, logger: Logger): Renderer {
  return async function renderJson(input) {
    const document = buildPlanetDocument(input);
    const dir = dirname(outputPath);
    const tempPath = join(dir, `.${basename(outputPath)}.${process.pid}.tmp`);

    await mkdir(dir, { recursive: true });
    try {
      await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
      await rename(tempPath, outputPath);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw err;
    }

    logger.info(
      { outputPath, entryCount: document.entries.length },
      "planet document written",
    );
  };
}
