import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFile } from "fs/promises";
import { join } from "node:path";
import { ZodError } from "zod";
import {
  loadConfig,
  loadDefaultConfig,
  loadPartialConfig,
  mergeConfig,
} from "./load-config";
import { makeTempDir, removeTempDir } from "../__fixtures__/helpers";

describe("loadDefaultConfig", () => {
  it("loads and validates the bundled defaults", async () => {
    const config = await loadDefaultConfig();
    expect(config.source.baseUrl).toBe("https://ar5iv.org/html/");
    expect(config.output.filename).toBe("README.md");
    expect(config.math.block).toEqual({ open: "$$", close: "$$" });
    expect(config.bibliography.idPrefix).toBe("bib.bib");
  });
});

describe("mergeConfig", () => {
  it("overrides per section and keeps the rest", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, {
      fetch: { timeout: 5000 },
      math: { inline: { open: "\\(", close: "\\)" } },
    });

    expect(merged.fetch).toEqual({ timeout: 5000, userAgent: "ar5iv2md/0.1" });
    expect(merged.math.inline).toEqual({ open: "\\(", close: "\\)" });
    expect(merged.math.block).toEqual(base.math.block);
    expect(merged.html).toEqual(base.html);
  });
});

describe("loadPartialConfig / loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("applies a custom config file", async () => {
    const path = join(dir, "custom.json");
    await writeFile(path, JSON.stringify({ output: { filename: "paper.md" } }));

    const { config, errors } = await loadConfig(path);
    expect(errors).toEqual([]);
    expect(config.output.filename).toBe("paper.md");
    expect(config.output.assetsDirectory).toBe("assets");
  });

  it("rejects values that fail the schema", async () => {
    const path = join(dir, "bad.json");
    await writeFile(path, JSON.stringify({ fetch: { timeout: -1 } }));
    await expect(loadPartialConfig(path)).rejects.toBeInstanceOf(ZodError);
  });

  it("reports a broken custom file and keeps the defaults", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ not json");

    const { config, errors } = await loadConfig(path);
    expect(errors).toHaveLength(1);
    expect(errors[0].path).toBe(path);
    expect(errors[0].error).toBeInstanceOf(SyntaxError);
    expect(config.output.filename).toBe("README.md");
  });
});
