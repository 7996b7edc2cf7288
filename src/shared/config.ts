import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getAppDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

/** [min, max] in seconds, sampled uniformly. */
const WindowSchema = z
  .tuple([z.number().nonnegative(), z.number().nonnegative()])
  .refine(([min, max]) => min <= max, { message: 'window min must not exceed max' });

export const ConfigSchema = z.object({
  platform: z
    .object({
      cookie: z.string().default(''),
      api_base: z.string().default('https://api.bilibili.com'),
      message_base: z.string().default('https://message.bilibili.com'),
      user_agent: z
        .string()
        .default(
          'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/110.0.0.0 Safari/537.36',
        ),
      timeout_ms: z.number().default(15000),
    })
    .default({}),

  archive: z
    .object({
      enabled: z.boolean().default(false),
      base_url: z.string().default('https://api.aicu.cc'),
      origin: z.string().default('https://www.aicu.cc'),
      page_size: z.number().int().positive().default(500),
      max_concurrent: z.number().int().positive().default(5),
      timeout_ms: z.number().default(30000),
    })
    .default({}),

  fetch: z
    .object({
      max_consecutive_errors: z.number().int().positive().default(3),
      error_delay: WindowSchema.default([5, 8]),
      feed_delay: WindowSchema.default([2, 5]),
      light_delay: WindowSchema.default([1, 2]),
      archive_delay: WindowSchema.default([2, 5]),
      jitter_stddev: z.number().nonnegative().default(1),
      min_delay: z.number().nonnegative().default(1),
      long_pause_probability: z.number().min(0).max(1).default(0.1),
      long_pause: WindowSchema.default([10, 20]),
      rest_every_pages: z.number().int().positive().default(10),
      rest: WindowSchema.default([5, 10]),
      resume_delay_seconds: z.number().nonnegative().default(30),
      max_resume_attempts: z.number().int().nonnegative().default(5),
    })
    .default({}),

  incremental: z
    .object({
      feed_max_pages: z.number().int().positive().default(10),
      archive_max_pages: z.number().int().positive().default(20),
      feed_delay_seconds: z.number().nonnegative().default(1),
      archive_delay_seconds: z.number().nonnegative().default(2),
    })
    .default({}),

  delete: z
    .object({
      delay_seconds: z.number().nonnegative().default(3),
      error_backoff_seconds: z.number().nonnegative().default(5),
      local_action: z.enum(['none', 'soft', 'hard']).default('soft'),
    })
    .default({}),

  server: z
    .object({
      port: z.number().default(3892),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  schedule: z
    .object({
      enabled: z.boolean().default(false),
      sync_cron: z.string().default('0 */6 * * *'),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.footprint/footprint.db'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('footprint', {
    searchPlaces: [
      'footprint.config.yaml',
      'footprint.config.yml',
      '.footprintrc.yaml',
      '.footprintrc.yml',
    ],
  });

  const envConfigPath = process.env['FOOTPRINT_CONFIG'];
  const defaultConfigPath = path.join(getAppDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    if (isRecord(result?.config)) rawConfig = result.config;
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    if (isRecord(result?.config)) rawConfig = result.config;
  } else {
    logger.debug('No config file found, using defaults');
  }

  const envCookie = process.env['FOOTPRINT_COOKIE'];
  if (envCookie) {
    const platform = isRecord(rawConfig['platform']) ? rawConfig['platform'] : {};
    platform['cookie'] = envCookie;
    rawConfig['platform'] = platform;
  }

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
