/**
 * Lazily created collaborators shared by the CLI commands
 */

import chalk from 'chalk';
import { ConfigManager } from '../core/config';
import { GraphClient } from '../core/graph';
import { AssignmentHistoryStore } from '../core/history';
import { AssignmentService } from '../core/assignment-service';
import { RateLimiter } from '../core/rate-limiter';
import { AppConfig, ConflictPolicy } from '../types';
import { ConfigurationError, toErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

let configManager: ConfigManager | null = null;
let historyStore: AssignmentHistoryStore | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManager) {
    configManager = new ConfigManager();
  }
  return configManager;
}

export function getHistoryStore(): AssignmentHistoryStore {
  if (!historyStore) {
    historyStore = new AssignmentHistoryStore();
  }
  return historyStore;
}

/**
 * Effective configuration with Azure credentials checked
 */
export function requireConfig(): AppConfig {
  const manager = getConfigManager();
  manager.requireAzureConfig();
  return manager.getConfig();
}

export function createGraphClient(config: AppConfig): GraphClient {
  return GraphClient.forConfig(config);
}

export function createAssignmentService(
  config: AppConfig,
  overrides: { concurrency?: number; conflictPolicy?: ConflictPolicy } = {}
): AssignmentService {
  return new AssignmentService({
    api: createGraphClient(config),
    rateLimiter: new RateLimiter(config.rateLimits),
    concurrency: overrides.concurrency ?? config.concurrency,
    conflictPolicy: overrides.conflictPolicy ?? config.conflictPolicy,
    requestTimeoutMs: config.requestTimeoutMs,
  });
}

export function closeContext(): void {
  historyStore?.close();
  historyStore = null;
}

/**
 * Report a command failure and exit
 */
export function exitWithError(action: string, error: unknown): never {
  console.error(chalk.red(`${action}: ${toErrorMessage(error)}`));
  if (error instanceof ConfigurationError && error.issues.length > 0) {
    console.error(chalk.dim('Run "intune-assign config show" to inspect the effective configuration.'));
  }
  logger.error(`${action}: ${toErrorMessage(error)}`);
  closeContext();
  process.exit(1);
}
