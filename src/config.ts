/**
 * Config Loader
 *
 * Loads configuration from .diskrings folders with priority:
 * 1. Environment variables (DISKRINGS_DEBUG, DISKRINGS_SIZE_MODE)
 * 2. Project-level .diskrings/config.json
 * 3. User-level ~/.diskrings/config.json
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { BUNDLE_EXTENSIONS } from '@diskrings/scanner';
import type { SizeMode } from '@diskrings/scanner';
import { DEFAULT_LAYOUT_OPTIONS } from '@diskrings/sunburst';
import type { LayoutOptions } from '@diskrings/sunburst';

const sizeModeSchema = z.enum(['allocated', 'logical']);

const configSchema = z.object({
  sizeMode: sizeModeSchema.optional(),
  layout: z
    .object({
      baseDepth: z.number().int().min(1).max(20).optional(),
      maxRings: z.number().int().min(1).max(50).optional(),
      minArcDeg: z.number().min(0).max(360).optional()
    })
    .optional(),
  report: z
    .object({
      maxSlicesPerRing: z.number().int().min(1).optional()
    })
    .optional(),
  /** Extra directory extensions to size as bundles */
  bundleExtensions: z.array(z.string().min(1)).optional(),
  debug: z.boolean().optional()
});

export type DiskringsConfig = z.infer<typeof configSchema>;

/**
 * Fully defaulted settings derived from a DiskringsConfig
 */
export interface Settings {
  sizeMode: SizeMode;
  layout: LayoutOptions;
  maxSlicesPerRing: number;
  bundleExtensions: string[];
  debug: boolean;
}

export const CONFIG_FOLDER = '.diskrings';
const CONFIG_FILE = 'config.json';
const DEFAULT_MAX_SLICES_PER_RING = 12;

/**
 * Load and validate one JSON config file. Missing files are silent;
 * unreadable or invalid ones are reported and skipped.
 */
async function loadConfigFile(filePath: string): Promise<DiskringsConfig | null> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    console.warn(`[config] Cannot read ${filePath}:`, error);
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    console.warn(`[config] Ignoring ${filePath}: not valid JSON (${error instanceof Error ? error.message : String(error)})`);
    return null;
  }

  const parsed = configSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    console.warn(`[config] Ignoring ${filePath}: ${issues.join('; ')}`);
    return null;
  }
  return parsed.data;
}

/**
 * Merge configs with later values taking precedence
 */
export function mergeConfigs(...configs: (DiskringsConfig | null)[]): DiskringsConfig {
  const result: DiskringsConfig = {};

  for (const config of configs) {
    if (!config) continue;

    if (config.sizeMode) {
      result.sizeMode = config.sizeMode;
    }

    if (config.layout) {
      result.layout = { ...result.layout, ...config.layout };
    }

    if (config.report) {
      result.report = { ...result.report, ...config.report };
    }

    // Bundle extensions accumulate across levels
    if (config.bundleExtensions) {
      const merged = new Set([...(result.bundleExtensions ?? []), ...config.bundleExtensions]);
      result.bundleExtensions = [...merged];
    }

    if (config.debug !== undefined) {
      result.debug = config.debug;
    }
  }

  return result;
}

/**
 * Config derived from environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): DiskringsConfig {
  const config: DiskringsConfig = {};

  if (env.DISKRINGS_DEBUG !== undefined) {
    config.debug = env.DISKRINGS_DEBUG === 'true';
  }

  if (env.DISKRINGS_SIZE_MODE !== undefined) {
    const sizeMode = sizeModeSchema.safeParse(env.DISKRINGS_SIZE_MODE);
    if (sizeMode.success) {
      config.sizeMode = sizeMode.data;
    } else {
      console.warn(`[config] Ignoring DISKRINGS_SIZE_MODE=${env.DISKRINGS_SIZE_MODE}: expected allocated or logical`);
    }
  }

  return config;
}

/**
 * Load configuration, user level first, then project level, then environment
 *
 * @param workingDir - The directory whose .diskrings folder is the project level
 * @param homeDir - The directory whose .diskrings folder is the user level
 */
export async function loadConfig(
  workingDir: string,
  homeDir: string = os.homedir(),
  env: NodeJS.ProcessEnv = process.env
): Promise<DiskringsConfig> {
  const userConfig = await loadConfigFile(path.join(homeDir, CONFIG_FOLDER, CONFIG_FILE));

  const projectPath = path.join(workingDir, CONFIG_FOLDER, CONFIG_FILE);
  const projectConfig =
    path.resolve(workingDir) === path.resolve(homeDir) ? null : await loadConfigFile(projectPath);

  return mergeConfigs(userConfig, projectConfig, configFromEnv(env));
}

/**
 * Fill every unset value with its default
 */
export function resolveSettings(config: DiskringsConfig): Settings {
  return {
    sizeMode: config.sizeMode ?? 'allocated',
    layout: { ...DEFAULT_LAYOUT_OPTIONS, ...config.layout },
    maxSlicesPerRing: config.report?.maxSlicesPerRing ?? DEFAULT_MAX_SLICES_PER_RING,
    bundleExtensions: [...BUNDLE_EXTENSIONS, ...(config.bundleExtensions ?? [])],
    debug: config.debug ?? false
  };
}
