/**
 * Command line interface
 *
 * Options fall back to environment variables, then to the defaults of
 * SiteConfigSchema.
 */

import { Command } from "commander";
import { resolveConfig, type SiteConfig } from "./config.js";
import { EXIT_CODES, SiteBuildError, exitCodeFor, getErrorMessage } from "./errors.js";
import { buildSite } from "./site-builder.js";
import { createLogger, logger as processLogger, type Logger } from "./utils/logger.js";

export interface CliOptions {
  input?: string;
  output?: string;
  title?: string;
  wikilinks?: string;
  logLevel?: string;
  logFile?: string;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("vault-site")
    .description("Generate a static HTML site from a vault of markdown notes")
    .version("1.0.0")
    .option("-i, --input <dir>", "Vault directory (env: VAULT_SITE_INPUT)")
    .option("-o, --output <dir>", "Output directory, wiped before each build (env: VAULT_SITE_OUTPUT)")
    .option("-t, --title <string>", "Site title shown in page titles (env: VAULT_SITE_TITLE)")
    .option("--wikilinks <mode>", "How [[links]] render: embed or link")
    .option("--log-level <level>", "fatal, error, warn, info, debug, trace or silent (env: LOG_LEVEL)")
    .option("--log-file <path>", "Also write log lines to this file")
    .action(async (opts: CliOptions) => {
      process.exitCode = await runBuild(opts);
    });

  return program;
}

/**
 * Resolve options, build the site and report the outcome.
 * Returns the process exit code.
 */
export async function runBuild(opts: CliOptions, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let config: SiteConfig;
  try {
    config = resolveConfig({
      inputDir: opts.input ?? env.VAULT_SITE_INPUT,
      outputDir: opts.output ?? env.VAULT_SITE_OUTPUT,
      siteTitle: opts.title ?? env.VAULT_SITE_TITLE,
      wikilinks: opts.wikilinks,
      logLevel: opts.logLevel ?? env.LOG_LEVEL,
      logFile: opts.logFile,
    });
  } catch (error) {
    return reportFailure(processLogger, error);
  }

  const log = createLogger({ level: config.logLevel, logFile: config.logFile });

  try {
    const summary = await buildSite(config, { logger: log });
    console.log(`Site generated at: ${summary.outputDir}`);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(log, error);
  }
}

function reportFailure(log: Logger, error: unknown): number {
  if (error instanceof SiteBuildError) {
    log.error({ group: "Cli", code: error.code, path: error.path }, error.message);
  } else {
    log.error({ group: "Cli", err: error }, `Build failed: ${getErrorMessage(error)}`);
  }
  return exitCodeFor(error);
}
