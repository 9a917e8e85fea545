/**
 * @fileoverview Referee configuration loading from YAML.
 * Validates and caches configuration for the referee process.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

// Schema for referee configuration
export const RefereeConfigSchema = z.object({
  referee: z.object({
    refereeId: z.string().min(1),
    refereeEmail: z.string().default(''),
    groupId: z.string().default(''),
    displayName: z.string().default('Q21 Referee'),
  }),
  league: z.object({
    leagueId: z.string().default(''),
    seasonId: z.string().default(''),
    leagueManagerEmail: z.string().min(1),
  }),
  timing: z
    .object({
      playerResponseTimeoutSeconds: z.number().positive().default(40),
      pollIntervalSeconds: z.number().positive().default(5),
    })
    .default({}),
  callbacks: z
    .object({
      mode: z.enum(['strict', 'safe']).default('strict'),
    })
    .default({}),
  status: z
    .object({
      enabled: z.boolean().default(false),
      port: z.number().int().min(0).max(65535).default(8080),
    })
    .default({}),
  demo: z
    .object({
      warmupQuestion: z.string().optional(),
      bookName: z.string().optional(),
      bookHint: z.string().optional(),
      associationWord: z.string().optional(),
      openingSentence: z.string().optional(),
    })
    .default({}),
});

export type RefereeConfig = z.infer<typeof RefereeConfigSchema>;
export type RefereeConfigInput = z.input<typeof RefereeConfigSchema>;
export type CallbackMode = RefereeConfig['callbacks']['mode'];

/**
 * Error thrown when configuration is missing or invalid.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(`Invalid referee configuration: ${message}`);
    this.name = 'ConfigError';
  }
}

/**
 * Validate a raw configuration object, applying defaults.
 * @throws {ConfigError} listing every invalid or missing key
 */
export function parseRefereeConfig(raw: unknown): RefereeConfig {
  const result = RefereeConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(issues.join('; '));
  }
  return result.data;
}

let cachedConfig: RefereeConfig | null = null;

/**
 * Load and validate referee configuration from YAML file.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - CONFIG_PATH environment variable if set
 * - Otherwise from ./config/referee.yaml relative to cwd (project root)
 */
export function loadRefereeConfig(): RefereeConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const configPath = process.env['CONFIG_PATH'] ?? join(process.cwd(), 'config/referee.yaml');

  const fileContents = readFileSync(configPath, 'utf8');
  const rawConfig: unknown = parseYaml(fileContents);
  const validatedConfig = parseRefereeConfig(rawConfig);
  cachedConfig = validatedConfig;
  return validatedConfig;
}

/**
 * Clear the cached config (useful for testing or hot-reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
