/**
 * JSON File Store
 * JSON 檔案讀寫 - 先寫入暫存檔再 rename，避免留下寫到一半的檔案
 */

import fs from 'node:fs';
import path from 'node:path';
import { formatJSON } from '../utils/output.js';
import { loggers } from '../lib/logger.js';

const log = loggers.store;

export class JsonFileStore {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  getPath(): string {
    return this.filePath;
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  /**
   * 讀取檔案
   * @returns 解析後的 JSON；檔案不存在時為 undefined
   * @throws SyntaxError 檔案內容不是合法 JSON
   */
  read(): unknown {
    if (!this.exists()) {
      log.debug('File not found', { file: this.filePath });
      return undefined;
    }
    const content = fs.readFileSync(this.filePath, 'utf-8');
    return JSON.parse(content);
  }

  /**
   * 整份覆寫（權限 0600，內容可能含憑證）
   */
  write(data: unknown): void {
    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tmpPath, formatJSON(data) + '\n', { encoding: 'utf-8', mode: 0o600 });
      fs.renameSync(tmpPath, this.filePath);
    } catch (error) {
      fs.rmSync(tmpPath, { force: true });
      throw error;
    }
    log.debug('File written', { file: this.filePath });
  }

  /**
   * 刪除檔案
   * @returns 是否有檔案被刪除
   */
  delete(): boolean {
    if (!this.exists()) {
      return false;
    }
    fs.unlinkSync(this.filePath);
    log.debug('File deleted', { file: this.filePath });
    return true;
  }
}
