import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { JsonFileStore } from '../../src/services/file-store.js';

describe('JsonFileStore', () => {
  let dir: string;
  let filePath: string;
  let store: JsonFileStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ymail-oauth-store-'));
    filePath = path.join(dir, 'data.json');
    store = new JsonFileStore(filePath);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should return undefined when the file does not exist', () => {
    expect(store.exists()).toBe(false);
    expect(store.read()).toBeUndefined();
  });

  it('should write pretty JSON and read it back', () => {
    store.write({ email: 'u@example.com' });

    expect(fs.readFileSync(filePath, 'utf-8')).toBe('{\n  "email": "u@example.com"\n}\n');
    expect(store.read()).toEqual({ email: 'u@example.com' });
  });

  it('should replace the previous content', () => {
    store.write({ a: 1, b: 2 });
    store.write({ c: 3 });

    expect(store.read()).toEqual({ c: 3 });
  });

  it('should leave no temporary file behind', () => {
    store.write({ a: 1 });

    expect(fs.readdirSync(dir)).toEqual(['data.json']);
  });

  it('should create missing parent directories', () => {
    const nested = new JsonFileStore(path.join(dir, 'a', 'b', 'data.json'));
    nested.write({ ok: true });

    expect(nested.read()).toEqual({ ok: true });
  });

  it('should restrict file permissions to the owner', () => {
    store.write({ secret: 'test-secret' });

    expect(fs.statSync(filePath).mode & 0o777).toBe(0o600);
  });

  it('should throw SyntaxError for malformed content', () => {
    fs.writeFileSync(filePath, '{ nope', 'utf-8');

    expect(() => store.read()).toThrow(SyntaxError);
  });

  it('should report whether a file was deleted', () => {
    store.write({ a: 1 });

    expect(store.delete()).toBe(true);
    expect(store.exists()).toBe(false);
    expect(store.delete()).toBe(false);
  });

  it('should resolve relative paths against the working directory', () => {
    expect(new JsonFileStore('token.json').getPath()).toBe(path.resolve('token.json'));
  });
});
