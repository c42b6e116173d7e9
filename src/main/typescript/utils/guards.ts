/**
 * INPUT: 未知型別的 JSON 值（設定檔、HTTP 請求體）
 * OUTPUT: 型別守衛
 * POS: 工具模組，供載入器與驗證器共用
 */

export function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}

export function isNonEmptyString(val: unknown): val is string {
  return typeof val === 'string' && val.trim().length > 0;
}

export function isFiniteNumber(val: unknown): val is number {
  return typeof val === 'number' && Number.isFinite(val);
}
