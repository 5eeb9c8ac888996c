import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { TokenStore } from '../../src/services/token-store.js';
import { MissingTokenError } from '../../src/lib/errors.js';

const token = {
  access_token: 'A',
  refresh_token: 'R',
  token_type: 'bearer',
  expires_in: 3600,
};

describe('TokenStore', () => {
  let dir: string;
  let tokenFile: string;
  let store: TokenStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ymail-oauth-token-'));
    tokenFile = path.join(dir, 'token.json');
    store = new TokenStore(tokenFile);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should save and load a token record', () => {
    store.save(token);

    expect(store.load()).toEqual(token);
  });

  it('should keep provider specific fields', () => {
    store.save({ ...token, id_token: 'id-token' });

    expect(store.load()).toEqual({ ...token, id_token: 'id-token' });
  });

  it('should raise MissingTokenError when the file does not exist', () => {
    expect(() => store.load()).toThrow(
      new MissingTokenError(tokenFile).message
    );
  });

  it('should raise MissingTokenError for malformed JSON', () => {
    fs.writeFileSync(tokenFile, 'not json', 'utf-8');

    expect(() => store.load()).toThrow(
      `Token file ${tokenFile} is not valid JSON; run exchange-code first`
    );
  });

  it('should raise MissingTokenError when the content is not a token', () => {
    fs.writeFileSync(tokenFile, JSON.stringify({ access_token: 'A' }), 'utf-8');

    expect(() => store.load()).toThrow(MissingTokenError);
  });

  it('should delete the file on clear', () => {
    store.save(token);

    expect(store.clear()).toBe(true);
    expect(fs.existsSync(tokenFile)).toBe(false);
  });
});
