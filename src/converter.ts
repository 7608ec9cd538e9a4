/**
 * Converter - Pipeline orchestrator
 * Runs one document end to end: fetch, sanitize, localize assets,
 * normalize math, convert, restore bibliography anchors, write
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "node:path";
import { load } from "cheerio";
import * as modules from "./modules";
import {
  decodeBody,
  guessBasename,
  isNonEmptyDirectory,
  toDocumentUrl,
} from "./utils";
import type { ConversionContext, FetchedResource, RunResult } from "./types";

export class Converter {
  constructor(private ctx: ConversionContext) {}

  /**
   * Convert `source` into `<outputBase>/<basename>/README.md`
   * Never throws: every failure is resolved into the returned result
   */
  async run(source: string, outputBase: string): Promise<RunResult> {
    const { config, logger, tracker, fetcher } = this.ctx;

    const url = toDocumentUrl(source, config.source.baseUrl);
    const outputDir = join(outputBase, guessBasename(url));
    const outputPath = join(outputDir, config.output.filename);

    try {
      if (await isNonEmptyDirectory(outputDir)) {
        logger.warn(`output directory is not empty, skipping: ${outputDir}`);
        return { status: "skipped", exitCode: 0, outputPath };
      }
    } catch (error) {
      return this.fail(outputDir, error, "write");
    }

    logger.debug(`fetching ${url}`);
    let resource: FetchedResource;
    try {
      resource = await fetcher.fetch(url, config.fetch.timeout);
    } catch (error) {
      return this.fail(url, error, "fetch");
    }

    try {
      const $ = load(decodeBody(resource.body, resource.contentType));

      modules.sanitize($, config.html.removeSelectors);

      await modules.localizeAssets(
        $,
        {
          baseUrl: resource.url,
          assetsDir: join(outputDir, config.output.assetsDirectory),
          assetsPath: config.output.assetsDirectory,
        },
        this.ctx,
      );

      const { fragments, unresolved } = modules.normalizeMath($, config.math);
      tracker.addMath(fragments.length, unresolved);

      const ids = modules.harvestBibliographyIds(
        $,
        config.bibliography.idPrefix,
      );
      const converted = modules.convertToMarkdown(
        $,
        fragments,
        config.markdown,
      );
      const { markdown, inserted } = modules.restoreBibliographyAnchors(
        converted,
        ids,
        config.bibliography,
      );
      tracker.addRestoredAnchors(inserted);

      await mkdir(outputDir, { recursive: true });
      await writeFile(outputPath, markdown, "utf-8");
    } catch (error) {
      return this.fail(outputPath, error, "write");
    }

    return { status: "converted", exitCode: 0, outputPath };
  }

  private fail(
    path: string,
    error: unknown,
    stage: "fetch" | "write",
  ): RunResult {
    const issue = this.ctx.tracker.trackError(path, error, "document", stage);
    const message = `failed to ${stage}: ${issue.details ?? issue.reason}`;
    this.ctx.logger.error(
      message,
      error instanceof Error ? error : undefined,
    );
    return { status: "failed", exitCode: 1, message };
  }
}
