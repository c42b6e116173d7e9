/**
 * INPUT: RuntimeConfig（環境變數）
 * OUTPUT: 全域 ModelRegistry、AuditSink 單例
 * POS: 核心模組，首次使用時載入模型設定與稽核 sink，之後全程唯讀共用
 */

import { loadRuntimeConfig } from '../config/runtimeConfig';
import { loadModelRegistry, ModelRegistry } from '../config/modelRegistry';
import { AuditSink, createAuditSink } from '../services/auditSink';

let registry: ModelRegistry | null = null;
let auditSink: AuditSink | null | undefined;

/** 取得模型 registry（設定錯誤時拋出，由進入點終止程序） */
export function getModelRegistry(): ModelRegistry {
  if (!registry) {
    const config = loadRuntimeConfig();
    registry = loadModelRegistry(config.modelDataDir, config.defaultModelProfile);
  }
  return registry;
}

/** 取得稽核 sink；未設定時為 null */
export function getAuditSink(): AuditSink | null {
  if (auditSink === undefined) {
    auditSink = createAuditSink(loadRuntimeConfig().audit);
  }
  return auditSink;
}
