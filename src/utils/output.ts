/**
 * Output Formatter Module
 * 輸出格式化模組
 */

/**
 * 格式化 JSON
 */
export function formatJSON<T>(data: T, pretty: boolean = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * 格式化回應內容：字串原樣輸出，其餘轉為 JSON
 */
export function formatBody(body: unknown, pretty: boolean = true): string {
  if (body === undefined || body === null) return '';
  if (typeof body === 'string') return body;
  return formatJSON(body, pretty);
}

/**
 * 遮蔽敏感字串，只保留前 4 碼
 */
export function maskSecret(value: string): string {
  if (value.length <= 4) {
    return '*'.repeat(value.length);
  }
  return value.slice(0, 4) + '*'.repeat(Math.min(value.length - 4, 12));
}
