/**
 * Token Store
 * Token 檔案管理 - 保存最近一次成功交換的 token
 */

import { JsonFileStore } from './file-store.js';
import { MissingTokenError } from '../lib/errors.js';
import { TokenRecordSchema, type TokenRecord } from '../types/auth.js';

export class TokenStore {
  private file: JsonFileStore;

  constructor(tokenFile: string) {
    this.file = new JsonFileStore(tokenFile);
  }

  getPath(): string {
    return this.file.getPath();
  }

  /**
   * 讀取 token
   * @throws MissingTokenError 檔案不存在或內容不是 token
   */
  load(): TokenRecord {
    let raw: unknown;
    try {
      raw = this.file.read();
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new MissingTokenError(this.getPath(), 'is not valid JSON', error);
      }
      throw error;
    }

    if (raw === undefined) {
      throw new MissingTokenError(this.getPath());
    }

    const parsed = TokenRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MissingTokenError(this.getPath(), 'does not hold a token record', parsed.error);
    }
    return parsed.data;
  }

  /**
   * 覆寫 token（不與舊內容合併）
   */
  save(token: TokenRecord): void {
    this.file.write(token);
  }

  clear(): boolean {
    return this.file.delete();
  }
}
