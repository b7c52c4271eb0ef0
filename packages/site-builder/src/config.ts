import path from "path";
import { homedir } from "os";
import { z } from "zod";
import { SiteBuildError } from "./errors.js";

export const WIKILINK_MODES = ["embed", "link"] as const;
export type WikilinkMode = (typeof WIKILINK_MODES)[number];

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

/**
 * Site generator configuration, merged from CLI flags and environment
 */
export const SiteConfigSchema = z.object({
  inputDir: z
    .string({ error: "Input directory is required (--input or VAULT_SITE_INPUT)" })
    .trim()
    .min(1, "Input directory is required (--input or VAULT_SITE_INPUT)"),
  outputDir: z.string().trim().min(1).default("./site"),
  siteTitle: z.string().default(""),
  wikilinks: z.enum(WIKILINK_MODES).default("embed"),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  logFile: z.string().trim().min(1).optional(),
});

export type SiteConfigInput = z.input<typeof SiteConfigSchema>;
export type SiteConfig = z.output<typeof SiteConfigSchema>;

/** Unvalidated options as they arrive from flags and environment */
export type RawSiteConfig = Partial<Record<keyof SiteConfigInput, string>>;

/**
 * Validate raw options and turn directories into absolute paths
 */
export function resolveConfig(input: RawSiteConfig, cwd: string = process.cwd()): SiteConfig {
  const parsed = SiteConfigSchema.safeParse(input);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => {
        const field = issue.path.map(String).join(".");
        return field ? `${field}: ${issue.message}` : issue.message;
      })
      .join("; ");
    throw new SiteBuildError("INVALID_CONFIG", `Invalid configuration: ${details}`);
  }

  const config = parsed.data;
  return {
    ...config,
    inputDir: path.resolve(cwd, expandHome(config.inputDir)),
    outputDir: path.resolve(cwd, expandHome(config.outputDir)),
    logFile: config.logFile ? path.resolve(cwd, expandHome(config.logFile)) : undefined,
  };
}

// Expand ~ to home directory
function expandHome(value: string): string {
  return value === "~" || value.startsWith("~/") ? value.replace("~", homedir()) : value;
}
