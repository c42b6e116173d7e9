/**
 * INPUT: POST /api/affordability/evaluate | breakdown.csv | report.pdf（EvaluationRequest JSON）
 * OUTPUT: { success: true, data: AffordabilityVerdict, encoding } / CSV 明細表 / PDF 報告
 * POS: API 層，路由 + 欄位驗證，呼叫 affordabilityService；evaluate 另寫入一筆稽核紀錄（不等待）
 */

import { Router, Request, Response } from 'express';
import { AffordabilityError } from '../models/errors';
import { getAuditSink, getModelRegistry } from '../core/modelContext';
import { parseEvaluationRequest } from '../utils/validators';
import {
  buildEvaluationRecord,
  evaluateWithProfile,
  ProfileEvaluation,
} from '../services/affordabilityService';
import { recordEvaluation } from '../services/auditSink';
import { BREAKDOWN_CSV_FILENAME, breakdownToCsv } from '../services/breakdownCsv';
import { generateVerdictReportPdf, VERDICT_REPORT_FILENAME } from '../services/verdictReportGenerator';

export const affordabilityRouter = Router();

// ─── 共用輔助 ──────────────────────────────────────────────────

function sendError(res: Response, err: unknown, tag: string): void {
  if (err instanceof AffordabilityError && err.status < 500) {
    res.status(err.status).json({ success: false, code: err.code, message: err.message });
    return;
  }
  console.error(`[affordability] ${tag} 評估錯誤:`, err);
  res.status(500).json({
    success: false,
    ...(err instanceof AffordabilityError ? { code: err.code } : {}),
    message: 'Affordability evaluation failed',
    error: err instanceof Error ? err.message : String(err),
  });
}

/** 驗證 + 評估；失敗時已回應錯誤並回傳 null */
function runEvaluation(req: Request, res: Response, tag: string): ProfileEvaluation | null {
  const parsed = parseEvaluationRequest(req.body);
  if (!parsed.valid) {
    res.status(400).json({ success: false, code: 'INVALID_REQUEST', message: parsed.error });
    return null;
  }
  try {
    return evaluateWithProfile(parsed.request, getModelRegistry());
  } catch (err) {
    sendError(res, err, tag);
    return null;
  }
}

// ─── POST /api/affordability/evaluate ─────────────────────────

affordabilityRouter.post('/affordability/evaluate', (req: Request, res: Response): void => {
  const evaluation = runEvaluation(req, res, 'evaluate');
  if (!evaluation) return;

  res.json({ success: true, data: evaluation.verdict, encoding: evaluation.encoding });

  // 稽核紀錄不阻塞回應，失敗僅記錄警告
  void recordEvaluation(getAuditSink(), buildEvaluationRecord(evaluation.verdict, evaluation.profile));
});

// ─── POST /api/affordability/breakdown.csv ────────────────────

affordabilityRouter.post('/affordability/breakdown.csv', (req: Request, res: Response): void => {
  const evaluation = runEvaluation(req, res, 'breakdown.csv');
  if (!evaluation) return;

  res.setHeader('Content-Type', 'text/csv; charset=utf-8');
  res.setHeader('Content-Disposition', `attachment; filename="${BREAKDOWN_CSV_FILENAME}"`);
  res.send(breakdownToCsv(evaluation.verdict.breakdown));
});

// ─── POST /api/affordability/report.pdf ───────────────────────

affordabilityRouter.post('/affordability/report.pdf', async (req: Request, res: Response): Promise<void> => {
  const evaluation = runEvaluation(req, res, 'report.pdf');
  if (!evaluation) return;

  try {
    const pdf = await generateVerdictReportPdf(evaluation.verdict);
    res.setHeader('Content-Type', 'application/pdf');
    res.setHeader('Content-Disposition', `attachment; filename="${VERDICT_REPORT_FILENAME}"`);
    res.send(Buffer.from(pdf));
  } catch (err) {
    sendError(res, err, 'report.pdf');
  }
});
