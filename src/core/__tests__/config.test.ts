import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigManager } from '../config';
import { ConfigurationError } from '../../utils/errors';

const TENANT_ID = '11111111-2222-3333-4444-555555555555';
const CLIENT_ID = 'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee';

describe('ConfigManager', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'intune-assign-config-'));
  });

  afterEach(() => {
    fs.rmSync(configDir, { recursive: true, force: true });
  });

  function writeConfig(contents: unknown): void {
    fs.writeFileSync(path.join(configDir, 'config.json'), JSON.stringify(contents));
  }

  it('falls back to defaults without a file or environment', () => {
    const manager = new ConfigManager(configDir, {});

    expect(manager.getConfig()).toEqual({
      azure: { tenantId: '', clientId: '', clientSecret: '' },
      concurrency: 3,
      conflictPolicy: 'overwrite',
      requestTimeoutMs: 30000,
      rateLimits: { maxWriteRequests: 100, maxTotalRequests: 1000, windowMs: 20000 },
    });
  });

  it('layers the environment over the config file', () => {
    writeConfig({
      tenantId: TENANT_ID,
      clientId: CLIENT_ID,
      concurrency: 2,
      conflictPolicy: 'skip',
      rateLimits: { maxWriteRequests: 50, maxTotalRequests: 500 },
    });

    const manager = new ConfigManager(configDir, {
      INTUNE_CLIENT_SECRET: 'test-secret',
      INTUNE_ASSIGN_CONCURRENCY: '5',
      INTUNE_ASSIGN_WINDOW_MS: '10000',
    });

    expect(manager.getConfig()).toEqual({
      azure: { tenantId: TENANT_ID, clientId: CLIENT_ID, clientSecret: 'test-secret' },
      concurrency: 5,
      conflictPolicy: 'skip',
      requestTimeoutMs: 30000,
      rateLimits: { maxWriteRequests: 50, maxTotalRequests: 500, windowMs: 10000 },
    });
    expect(manager.requireAzureConfig()).toEqual({
      tenantId: TENANT_ID,
      clientId: CLIENT_ID,
      clientSecret: 'test-secret',
    });
  });

  it('rejects an invalid config file', () => {
    writeConfig({ concurrency: 12, clientSecret: 'test-secret' });

    expect(() => new ConfigManager(configDir, {})).toThrow(ConfigurationError);
  });

  it('rejects invalid environment values', () => {
    const manager = new ConfigManager(configDir, { INTUNE_ASSIGN_CONFLICT_POLICY: 'merge' });

    expect(() => manager.getConfig()).toThrow(/^Invalid environment configuration: INTUNE_ASSIGN_CONFLICT_POLICY: /);
  });

  it('lists every credential problem', () => {
    const manager = new ConfigManager(configDir, { INTUNE_TENANT_ID: 'contoso' });

    expect(() => manager.requireAzureConfig()).toThrow(
      'Azure credentials are not configured: Invalid tenant ID format (expected GUID); ' +
        'Invalid client ID format (expected GUID); Client secret is required (set INTUNE_CLIENT_SECRET)'
    );
  });

  it('saves settings without the secret and reloads them', () => {
    const manager = new ConfigManager(configDir, { INTUNE_CLIENT_SECRET: 'test-secret' });

    const saved = manager.save({ tenantId: TENANT_ID, clientId: CLIENT_ID, concurrency: 4 });

    expect(saved).toEqual({ tenantId: TENANT_ID, clientId: CLIENT_ID, concurrency: 4 });
    const written = fs.readFileSync(manager.getConfigPath(), 'utf-8');
    expect(JSON.parse(written)).toEqual(saved);
    expect(new ConfigManager(configDir, {}).getFileConfig()).toEqual(saved);
  });

  it('refuses to save invalid settings', () => {
    const manager = new ConfigManager(configDir, {});

    expect(() => manager.save({ concurrency: 0 })).toThrow(ConfigurationError);
    expect(fs.existsSync(manager.getConfigPath())).toBe(false);
  });
});
