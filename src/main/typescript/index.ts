/**
 * INPUT: 環境變數（.env）、data/coefficients、data/schemas
 * OUTPUT: Express HTTP 伺服器（租屋可負擔評估 API）
 * POS: 應用程式進入點，載入模型設定並整合所有路由
 */

import dotenv from 'dotenv';
dotenv.config();

import express from 'express';
import { loadRuntimeConfig } from './config/runtimeConfig';
import { getAuditSink, getModelRegistry } from './core/modelContext';
import { affordabilityRouter } from './api/affordability';
import { modelProfilesRouter } from './api/modelProfiles';

const config = loadRuntimeConfig();

// 模型設定錯誤屬啟動失敗，不帶著錯誤設定上線
try {
  getModelRegistry();
} catch (err) {
  console.error('[startup] 模型設定載入失敗:', err instanceof Error ? err.message : err);
  process.exit(1);
}

const auditSink = getAuditSink();

const app = express();
app.use(express.json());

// 表單前端公開 API（允許 CORS）
app.use('/api', (_req, res, next) => {
  res.header('Access-Control-Allow-Origin', '*');
  res.header('Access-Control-Allow-Headers', 'Content-Type');
  res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  next();
});
app.options('/api/*', (_req, res) => res.sendStatus(200));
app.use('/api', modelProfilesRouter);
app.use('/api', affordabilityRouter);

// 健康檢查
app.get('/health', (_req, res) => {
  res.json({ status: 'ok', service: 'rental-affordability-checker' });
});

app.listen(config.port, () => {
  console.log(`[startup] Rental Affordability Checker 運行於 http://localhost:${config.port}`);
  console.log(`[startup] 預設模型 profile：${config.defaultModelProfile}`);
  console.log(`[startup] 稽核紀錄：${auditSink ? auditSink.name : '未啟用'}`);
});
