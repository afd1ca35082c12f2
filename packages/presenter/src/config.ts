/**
 * Presenter configuration - termslides.yaml, environment, CLI flags.
 *
 * Precedence, lowest to highest: defaults, config file, environment,
 * flags. The merged object is validated once with zod.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '@termslides/shared';

export const CONFIG_FILE = 'termslides.yaml';

export const presenterConfigSchema = z
  .object({
    slidesDir: z.string().min(1).default('slides').describe('Directory holding the slide files'),
    extension: z.string().regex(/^\.[A-Za-z0-9]+$/, 'must look like ".md"').default('.md'),
    lineWidth: z.number().int().min(1).default(72).describe('Column width every content line should have'),
    align: z.enum(['left', 'center']).default('center'),
    invalidSlides: z.enum(['skip', 'abort']).default('skip'),
    requireSlides: z.boolean().default(true),
    notesHeading: z.string().min(1).default('Speaker Notes'),
    scrollStep: z.number().int().min(1).max(100).default(1),
  })
  .strict();

export type PresenterConfig = z.infer<typeof presenterConfigSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config file; unlike the default file it must exist */
  configPath?: string;
  env?: Record<string, string | undefined>;
  /** Values from command-line flags, validated with everything else */
  overrides?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read and YAML-parse a config file. An empty file is an empty config.
 */
async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  const text = await readFile(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`Cannot parse ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`${path} must contain a mapping of settings`);
  }
  return parsed;
}

/**
 * Environment overrides. Values stay strings where they fail to parse so
 * validation reports them.
 */
export function configFromEnv(env: Record<string, string | undefined>): Record<string, unknown> {
  const fromEnv: Record<string, unknown> = {};
  if (env.TERMSLIDES_DIR) {
    fromEnv.slidesDir = env.TERMSLIDES_DIR;
  }
  if (env.TERMSLIDES_LINE_WIDTH) {
    const width = Number(env.TERMSLIDES_LINE_WIDTH);
    fromEnv.lineWidth = Number.isNaN(width) ? env.TERMSLIDES_LINE_WIDTH : width;
  }
  return fromEnv;
}

/**
 * Validate a merged raw config.
 *
 * @throws ConfigError listing every invalid setting
 */
export function parseConfig(raw: unknown, origin: string = 'configuration'): PresenterConfig {
  const result = presenterConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigError(`Invalid ${origin}`, issues);
  }
  return result.data;
}

/**
 * Load the effective configuration. `slidesDir` comes back resolved
 * against `cwd`.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<PresenterConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let fromFile: Record<string, unknown> = {};
  let origin = 'configuration';
  if (options.configPath) {
    const path = resolve(cwd, options.configPath);
    if (!existsSync(path)) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    fromFile = await readConfigFile(path);
    origin = `configuration (${path})`;
  } else {
    const path = join(cwd, CONFIG_FILE);
    if (existsSync(path)) {
      fromFile = await readConfigFile(path);
      origin = `configuration (${path})`;
    }
  }

  const config = parseConfig({ ...fromFile, ...configFromEnv(env), ...options.overrides }, origin);
  return { ...config, slidesDir: resolve(cwd, config.slidesDir) };
}
