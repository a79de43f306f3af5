/**
 * Configuration Management
 * Loads the config file, overlays environment variables, validates both
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { AppConfig, AzureConfig } from '../types';
import { DEFAULT_ASSIGNMENT_OPTIONS, PATHS, RATE_LIMITS } from '../utils/constants';
import { ConfigurationError, toErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const GUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export const configFileSchema = z
  .object({
    tenantId: z.string().optional(),
    clientId: z.string().optional(),
    concurrency: z.number().int().min(1).max(8).optional(),
    conflictPolicy: z.enum(['overwrite', 'skip']).optional(),
    requestTimeoutMs: z.number().int().positive().optional(),
    rateLimits: z
      .object({
        maxWriteRequests: z.number().int().positive().optional(),
        maxTotalRequests: z.number().int().positive().optional(),
        windowMs: z.number().int().positive().optional(),
      })
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

const envSchema = z.object({
  INTUNE_TENANT_ID: z.string().min(1).optional(),
  INTUNE_CLIENT_ID: z.string().min(1).optional(),
  INTUNE_CLIENT_SECRET: z.string().min(1).optional(),
  INTUNE_ASSIGN_CONCURRENCY: z.coerce.number().int().min(1).max(8).optional(),
  INTUNE_ASSIGN_CONFLICT_POLICY: z.enum(['overwrite', 'skip']).optional(),
  INTUNE_ASSIGN_MAX_WRITES: z.coerce.number().int().positive().optional(),
  INTUNE_ASSIGN_WINDOW_MS: z.coerce.number().int().positive().optional(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export class ConfigManager {
  private configDir: string;
  private configFile: string;
  private fileConfig: ConfigFile = {};
  private env: NodeJS.ProcessEnv;

  constructor(configDir?: string, env: NodeJS.ProcessEnv = process.env) {
    this.configDir = configDir || path.join(process.cwd(), PATHS.CONFIG_DIR);
    this.configFile = path.join(this.configDir, PATHS.CONFIG_FILE);
    this.env = env;
    this.loadConfig();
  }

  private loadConfig(): void {
    if (!fs.existsSync(this.configFile)) {
      logger.debug(`No config file at ${this.configFile}; using defaults`);
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.configFile, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to read ${this.configFile}`, [toErrorMessage(error)]);
    }

    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid configuration in ${this.configFile}`, formatIssues(parsed.error));
    }

    this.fileConfig = parsed.data;
    logger.debug(`Loaded configuration from ${this.configFile}`);
  }

  getConfigPath(): string {
    return this.configFile;
  }

  getFileConfig(): ConfigFile {
    return structuredClone(this.fileConfig);
  }

  /**
   * Effective configuration: defaults, then the config file, then the environment
   */
  getConfig(): AppConfig {
    const parsedEnv = envSchema.safeParse(this.env);
    if (!parsedEnv.success) {
      throw new ConfigurationError('Invalid environment configuration', formatIssues(parsedEnv.error));
    }
    const env = parsedEnv.data;
    const file = this.fileConfig;

    return {
      azure: {
        tenantId: env.INTUNE_TENANT_ID ?? file.tenantId ?? '',
        clientId: env.INTUNE_CLIENT_ID ?? file.clientId ?? '',
        clientSecret: env.INTUNE_CLIENT_SECRET ?? '',
      },
      concurrency: env.INTUNE_ASSIGN_CONCURRENCY ?? file.concurrency ?? DEFAULT_ASSIGNMENT_OPTIONS.concurrency,
      conflictPolicy:
        env.INTUNE_ASSIGN_CONFLICT_POLICY ?? file.conflictPolicy ?? DEFAULT_ASSIGNMENT_OPTIONS.conflictPolicy,
      requestTimeoutMs: file.requestTimeoutMs ?? DEFAULT_ASSIGNMENT_OPTIONS.requestTimeoutMs,
      rateLimits: {
        maxWriteRequests:
          env.INTUNE_ASSIGN_MAX_WRITES ?? file.rateLimits?.maxWriteRequests ?? RATE_LIMITS.MAX_WRITE_REQUESTS,
        maxTotalRequests: file.rateLimits?.maxTotalRequests ?? RATE_LIMITS.MAX_TOTAL_REQUESTS,
        windowMs: env.INTUNE_ASSIGN_WINDOW_MS ?? file.rateLimits?.windowMs ?? RATE_LIMITS.WINDOW_MS,
      },
    };
  }

  /**
   * Persist non-secret settings. The client secret is never written.
   */
  save(updates: ConfigFile): ConfigFile {
    const parsed = configFileSchema.safeParse({ ...this.fileConfig, ...updates });
    if (!parsed.success) {
      throw new ConfigurationError('Invalid configuration', formatIssues(parsed.error));
    }

    if (!fs.existsSync(this.configDir)) {
      fs.mkdirSync(this.configDir, { recursive: true });
      logger.info(`Created config directory: ${this.configDir}`);
    }

    fs.writeFileSync(this.configFile, JSON.stringify(parsed.data, null, 2));
    this.fileConfig = parsed.data;
    logger.debug('Saved configuration');
    return this.getFileConfig();
  }

  /**
   * Validate Azure credentials
   */
  validateAzureConfig(azure: AzureConfig): string[] {
    const errors: string[] = [];

    if (!GUID_PATTERN.test(azure.tenantId)) {
      errors.push('Invalid tenant ID format (expected GUID)');
    }

    if (!GUID_PATTERN.test(azure.clientId)) {
      errors.push('Invalid client ID format (expected GUID)');
    }

    if (azure.clientSecret.length === 0) {
      errors.push('Client secret is required (set INTUNE_CLIENT_SECRET)');
    }

    return errors;
  }

  requireAzureConfig(): AzureConfig {
    const { azure } = this.getConfig();
    const errors = this.validateAzureConfig(azure);
    if (errors.length > 0) {
      throw new ConfigurationError('Azure credentials are not configured', errors);
    }
    return azure;
  }
}
