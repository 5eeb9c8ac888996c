/**
 * Test Sandbox
 * 每個測試使用獨立的暫存目錄與環境變數
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export interface Sandbox {
  dir: string;
  tokenFile: string;
  infoFile: string;
  configFile: string;
  env: Record<string, string>;
  writeToken: (token: unknown) => void;
  readJSON: (file: string) => unknown;
  cleanup: () => void;
}

export const TEST_API_BASE_URL = 'https://login.example.test';

export function createSandbox(overrides: Record<string, string> = {}): Sandbox {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ymail-oauth-test-'));
  const tokenFile = path.join(dir, 'token.json');
  const infoFile = path.join(dir, 'userinfo.json');
  const configFile = path.join(dir, 'config.json');

  return {
    dir,
    tokenFile,
    infoFile,
    configFile,
    env: {
      CLIENT_ID: 'test-client-id',
      CLIENT_SECRET: 'test-client-secret',
      REDIRECT_URI: 'https://localhost:8443/callback',
      API_BASE_URL: TEST_API_BASE_URL,
      TOKEN_FILE: tokenFile,
      INFO_FILE: infoFile,
      YMAIL_OAUTH_CONFIG: configFile,
      ...overrides,
    },
    writeToken: (token) => {
      fs.writeFileSync(tokenFile, JSON.stringify(token), 'utf-8');
    },
    readJSON: (file) => JSON.parse(fs.readFileSync(file, 'utf-8')),
    cleanup: () => {
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}
