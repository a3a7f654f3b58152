/**
 * Pipeline Configuration Loader
 *
 * Reads YAML pipeline definitions and merges environment-specific
 * overrides on top of `default.yaml`.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { deepmerge } from "deepmerge-ts";
import { parse } from "yaml";
import type { ZodError } from "zod";
import { log } from "../logger";
import { type PipelineConfig, PipelineConfigSchema } from "./schema";

/**
 * Raised when a configuration file parses but does not validate.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly source: string,
    public readonly issues: readonly string[]
  ) {
    super(`Invalid pipeline configuration in ${source}:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigValidationError";
  }

  static fromZodError(source: string, error: ZodError): ConfigValidationError {
    return new ConfigValidationError(
      source,
      error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
}

/**
 * Load and parse a YAML file
 *
 * @throws Error if the file cannot be read or parsed; the underlying
 * error is kept as `cause`
 */
async function loadYaml(path: string): Promise<unknown> {
  try {
    const content = await readFile(path, "utf-8");
    return parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load YAML from ${path}: ${message}`, { cause: error });
  }
}

function errnoCode(error: unknown): string | undefined {
  return error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && errnoCode(error.cause) === "ENOENT";
}

function validate(source: string, raw: unknown): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw ConfigValidationError.fromZodError(source, result.error);
  }
  return result.data;
}

/**
 * Environment name used to pick an override file.
 *
 * TIDEMARK_ENV wins over NODE_ENV; both unset means "development".
 */
export function resolveConfigEnvironment(env: NodeJS.ProcessEnv = process.env): string {
  return env.TIDEMARK_ENV ?? env.NODE_ENV ?? "development";
}

/**
 * Load a pipeline configuration from a single YAML file.
 *
 * @throws ConfigValidationError if the contents do not validate
 */
export async function loadPipelineConfig(path: string): Promise<PipelineConfig> {
  const raw = await loadYaml(path);
  const config = validate(path, raw);
  log.debug({ path, indicators: config.indicators.length }, "Loaded pipeline config");
  return config;
}

/**
 * Load `default.yaml` from `configDir` and merge `<environment>.yaml` over it.
 *
 * The override file is optional. Arrays in the override are appended to
 * the base list.
 *
 * @throws ConfigValidationError if the merged result does not validate
 */
export async function loadPipelineConfigWithOverrides(
  configDir: string,
  environment: string = resolveConfigEnvironment()
): Promise<PipelineConfig> {
  const base = await loadYaml(join(configDir, "default.yaml"));

  let override: unknown = {};
  const overridePath = join(configDir, `${environment}.yaml`);
  try {
    override = await loadYaml(overridePath);
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
    log.warn({ path: overridePath, environment }, "No override file found, using defaults only");
  }

  const merged = deepmerge(base ?? {}, override ?? {});
  const config = validate(`${configDir} (${environment})`, merged);
  log.debug({ configDir, environment, indicators: config.indicators.length }, "Loaded pipeline config");
  return config;
}
