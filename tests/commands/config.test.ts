/**
 * Config Command Tests
 * 設定檔管理指令測試
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import { runCLI } from '../helpers/cli-runner.js';
import { createSandbox, type Sandbox } from '../helpers/sandbox.js';

describe('Config Command', () => {
  let sandbox: Sandbox;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    sandbox = createSandbox();
  });

  afterEach(() => {
    sandbox.cleanup();
    vi.restoreAllMocks();
  });

  it('should print the config file path', async () => {
    const result = await runCLI(['config', 'path'], { env: sandbox.env });

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe(`${sandbox.configFile}\n`);
  });

  it('should honor --config', async () => {
    const other = `${sandbox.dir}/other.json`;
    const result = await runCLI(['--config', other, 'config', 'path'], { env: sandbox.env });

    expect(result.stdout).toBe(`${other}\n`);
  });

  it('should set, get and unset a value', async () => {
    const set = await runCLI(['config', 'set', 'scope', 'openid mail-r'], { env: sandbox.env });
    expect(set.exitCode).toBe(0);
    expect(sandbox.readJSON(sandbox.configFile)).toEqual({ scope: 'openid mail-r' });

    const get = await runCLI(['config', 'get', 'scope'], { env: sandbox.env });
    expect(get.stdout).toBe('openid mail-r\n');

    await runCLI(['config', 'unset', 'scope'], { env: sandbox.env });
    expect(sandbox.readJSON(sandbox.configFile)).toEqual({});
  });

  it('should reject unknown keys', async () => {
    const result = await runCLI(['config', 'set', 'password', 'x'], { env: sandbox.env });

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain('Error [INVALID_ARGUMENT]: Unknown config key: password');
    expect(fs.existsSync(sandbox.configFile)).toBe(false);
  });

  it('should reject invalid values', async () => {
    const result = await runCLI(['config', 'set', 'timeoutMs', 'soon'], { env: sandbox.env });

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain('Error [INVALID_ARGUMENT]: Invalid value for timeoutMs');
  });

  it('should list the effective configuration with the secret masked', async () => {
    const result = await runCLI(['config', 'list'], { env: sandbox.env });

    expect(result.exitCode).toBe(0);
    expect(result.json).toMatchObject({
      clientId: 'test-client-id',
      clientSecret: 'test************',
      redirectUri: 'https://localhost:8443/callback',
      scope: 'openid email profile',
      tokenAuthMethod: 'client_secret_post',
      timeoutMs: 15000,
    });
  });

  it('should let stored values feed the OAuth commands', async () => {
    const env = { ...sandbox.env };
    delete env.CLIENT_ID;

    await runCLI(['config', 'set', 'clientId', 'stored-client-id'], { env });
    const result = await runCLI(['authorization-url'], { env });

    expect(result.exitCode).toBe(0);
    expect(new URL(result.stdout.trim()).searchParams.get('client_id')).toBe('stored-client-id');
  });
});
