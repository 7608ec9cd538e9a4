/**
 * Asset Localizer Module
 * Downloads every distinct image once and points the DOM at the local copy
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "node:path";
import type { CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { fileExists, assetBasename, uniqueName } from "../utils";
import type { AssetReference, ConversionContext } from "../types";

export interface LocalizeOptions {
  baseUrl: string; // Final document URL, used to resolve relative src values
  assetsDir: string; // Absolute directory the files are written to
  assetsPath: string; // Directory as referenced from the Markdown file
}

function isInlineData(src: string): boolean {
  return /^data:/i.test(src);
}

function resolveUrl(src: string, baseUrl: string): string | null {
  try {
    return new URL(src, baseUrl).href;
  } catch {
    return null;
  }
}

/**
 * Localize all <img> references in document order
 *
 * The cache is keyed by absolute URL, so two spellings of the same
 * reference share one download. A failed download leaves that <img> untouched.
 */
export async function localizeAssets(
  $: CheerioAPI,
  options: LocalizeOptions,
  ctx: ConversionContext,
): Promise<AssetReference[]> {
  const { config, fetcher, tracker, logger } = ctx;
  const cache = new Map<string, string>();
  const assets: AssetReference[] = [];
  const reserved = new Set<string>();
  // URLs whose download already failed in this run are not fetched again
  const failed = new Set<string>();

  const isTaken = async (candidate: string): Promise<boolean> =>
    reserved.has(candidate) ||
    (await fileExists(join(options.assetsDir, candidate)));

  await mkdir(options.assetsDir, { recursive: true });

  const images: Element[] = $("img").toArray();
  for (const img of images) {
    const $img = $(img);
    const src = ($img.attr("src") ?? "").trim();
    if (!src || isInlineData(src)) {
      tracker.incrementImagesSkipped();
      continue;
    }

    const absoluteUrl = resolveUrl(src, options.baseUrl);
    if (!absoluteUrl) {
      logger.warn(`invalid image reference: ${src}`);
      tracker.incrementImagesSkipped();
      continue;
    }

    const cached = cache.get(absoluteUrl);
    if (cached) {
      $img.attr("src", cached);
      tracker.incrementImagesReused();
      continue;
    }

    if (failed.has(absoluteUrl)) {
      tracker.incrementImagesFailed();
      continue;
    }

    const name = await uniqueName(
      assetBasename(absoluteUrl, config.images.fallbackName),
      config.images.fallbackExtension,
      isTaken,
    );

    let body: Uint8Array;
    try {
      ({ body } = await fetcher.fetch(absoluteUrl, config.fetch.timeout));
    } catch (error) {
      const issue = tracker.trackError(absoluteUrl, error, "image");
      tracker.incrementImagesFailed();
      failed.add(absoluteUrl);
      logger.warn(
        `failed to download image: ${absoluteUrl} (${issue.details ?? issue.reason})`,
      );
      continue;
    }

    try {
      await writeFile(join(options.assetsDir, name), body);
    } catch (error) {
      const issue = tracker.trackError(absoluteUrl, error, "image", "write");
      tracker.incrementImagesFailed();
      failed.add(absoluteUrl);
      logger.warn(
        `failed to save image: ${absoluteUrl} (${issue.details ?? issue.reason})`,
      );
      continue;
    }

    reserved.add(name);
    const localPath = `${options.assetsPath}/${name}`;
    cache.set(absoluteUrl, localPath);
    assets.push({ originalUrl: absoluteUrl, localPath });
    $img.attr("src", localPath);
    tracker.incrementImagesDownloaded();
    logger.debug(`saved ${absoluteUrl} -> ${localPath}`);
  }

  return assets;
}
