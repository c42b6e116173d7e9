/**
 * INPUT: 環境變數（.env 由進入點以 dotenv 載入）
 * OUTPUT: RuntimeConfig（埠號、模型資料目錄、預設 profile、稽核紀錄設定）
 * POS: 設定層，集中解析環境變數；傳入 env 物件即可於測試中替換
 */

import * as path from 'path';

/** 預設資料目錄（repo 根目錄 data/） */
export const DEFAULT_MODEL_DATA_DIR = path.resolve(__dirname, '../../../../data');
export const DEFAULT_MODEL_PROFILE = 'english-v1';
const DEFAULT_PORT = 3000;
export const DEFAULT_AUDIT_WEBHOOK_TIMEOUT_MS = 5_000;

export type AuditSinkConfig =
  | { kind: 'none' }
  | { kind: 'file'; filePath: string }
  | { kind: 'webhook'; url: string; token: string | null; timeoutMs: number };

export interface RuntimeConfig {
  port: number;
  modelDataDir: string;
  defaultModelProfile: string;
  audit: AuditSinkConfig;
}

function readAuditConfig(env: NodeJS.ProcessEnv): AuditSinkConfig {
  const url = env.AUDIT_WEBHOOK_URL?.trim();
  if (url) {
    const timeoutMs = parseInt(env.AUDIT_WEBHOOK_TIMEOUT_MS ?? '', 10);
    return {
      kind: 'webhook',
      url,
      token: env.AUDIT_WEBHOOK_TOKEN?.trim() || null,
      timeoutMs: Number.isInteger(timeoutMs) && timeoutMs > 0 ? timeoutMs : DEFAULT_AUDIT_WEBHOOK_TIMEOUT_MS,
    };
  }
  const filePath = env.AUDIT_LOG_FILE?.trim();
  if (filePath) {
    return { kind: 'file', filePath: path.resolve(filePath) };
  }
  return { kind: 'none' };
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const port = parseInt(env.PORT ?? '', 10);
  const dataDir = env.MODEL_DATA_DIR?.trim();
  return {
    port: Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT,
    modelDataDir: dataDir ? path.resolve(dataDir) : DEFAULT_MODEL_DATA_DIR,
    defaultModelProfile: env.DEFAULT_MODEL_PROFILE?.trim() || DEFAULT_MODEL_PROFILE,
    audit: readAuditConfig(env),
  };
}
