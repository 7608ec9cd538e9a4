/**
 * Convert command - Loads config and runs the conversion pipeline
 */

import ora from "ora";
import { z } from "zod";
import { loadConfig, HttpFetcher, Logger, Tracker } from "../../utils";
import { Converter } from "../../converter";
import * as modules from "../../modules";
import type { ConversionContext } from "../../types";

const ConvertOptionsSchema = z.object({
  downloadDir: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export async function convertCommand(
  source: string,
  opts: unknown,
): Promise<void> {
  const spinner = ora({ text: "Loading configuration...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = ConvertOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.downloadDir) {
      config.output.directory = options.downloadDir;
    }
    if (options.verbose) {
      config.logging.level = "debug";
    }

    const tracker = new Tracker();
    const logger = new Logger({
      level: config.logging.level,
      // Keep the spinner line out of the way of log output
      write: (line) => {
        spinner.clear();
        process.stderr.write(`${line}\n`);
        spinner.render();
      },
    });

    // Add any config loading errors to tracker
    for (const err of errors) {
      const issue = tracker.trackError(err.path, err.error, "resource");
      logger.warn(`ignoring config ${err.path} (${issue.details ?? issue.reason})`);
    }

    const ctx: ConversionContext = {
      config,
      tracker,
      logger,
      fetcher: new HttpFetcher(config.fetch.userAgent),
    };

    spinner.text = `Converting ${source}...`;
    const result = await new Converter(ctx).run(source, config.output.directory);

    spinner.stop();

    if (options.verbose) {
      modules.stats(tracker);
    }

    if (result.outputPath) {
      console.log(result.outputPath);
    }
    process.exitCode = result.exitCode;
  } catch (error) {
    spinner.fail("Conversion failed");
    console.error(error);
    process.exit(1);
  }
}
