/**
 * INPUT: EvaluationRecord（每次評估一筆）
 * OUTPUT: AuditOutcome（成功 / AuditSinkError），永不拋出
 * POS: 服務層，選用的外部稽核紀錄（JSON Lines 檔案或試算表 webhook）
 *
 * 設定方式（.env）：
 *   AUDIT_WEBHOOK_URL=https://...     → WebhookAuditSink（搭配 AUDIT_WEBHOOK_TOKEN、AUDIT_WEBHOOK_TIMEOUT_MS）
 *   AUDIT_LOG_FILE=data/evaluations.jsonl → JsonLinesAuditSink
 *   皆未設定 → 不寫入
 * 寫入失敗只記錄警告，絕不影響評估結果。
 */

import * as fs from 'fs';
import * as path from 'path';
import { EvaluationRecord } from '../models/affordability';
import { AuditSinkError } from '../models/errors';
import { AuditSinkConfig } from '../config/runtimeConfig';

export type AuditOutcome = { ok: true } | { ok: false; error: AuditSinkError };

export interface AuditSink {
  readonly name: string;
  append(record: EvaluationRecord): Promise<AuditOutcome>;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** 逐行附加 JSON（append-only） */
export class JsonLinesAuditSink implements AuditSink {
  readonly name = 'jsonl';

  constructor(private readonly filePath: string) {}

  async append(record: EvaluationRecord): Promise<AuditOutcome> {
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.appendFile(this.filePath, JSON.stringify(record) + '\n', 'utf-8');
      return { ok: true };
    } catch (err) {
      return {
        ok: false,
        error: new AuditSinkError(this.name, `無法寫入稽核檔 ${this.filePath}：${errorMessage(err)}`),
      };
    }
  }
}

/** POST 至外部紀錄端點（試算表橋接服務），以 Bearer token 驗證；逾時即中止請求 */
export class WebhookAuditSink implements AuditSink {
  readonly name = 'webhook';

  constructor(
    private readonly url: string,
    private readonly token: string | null,
    private readonly timeoutMs: number,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async append(record: EvaluationRecord): Promise<AuditOutcome> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.token) headers['Authorization'] = `Bearer ${this.token}`;

    const signal = AbortSignal.timeout(this.timeoutMs);
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify(record),
        signal,
      });
    } catch (err) {
      const message = signal.aborted
        ? `稽核端點逾時（${this.timeoutMs} ms）`
        : `稽核端點無法連線：${errorMessage(err)}`;
      return { ok: false, error: new AuditSinkError(this.name, message) };
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      return {
        ok: false,
        error: new AuditSinkError(this.name, `稽核端點回傳錯誤 ${response.status}：${body}`),
      };
    }
    return { ok: true };
  }
}

export function createAuditSink(config: AuditSinkConfig): AuditSink | null {
  switch (config.kind) {
    case 'webhook':
      return new WebhookAuditSink(config.url, config.token, config.timeoutMs);
    case 'file':
      return new JsonLinesAuditSink(config.filePath);
    case 'none':
      return null;
  }
}

/**
 * 寫入一筆稽核紀錄（每次評估至多呼叫一次）
 * @returns 未設定 sink 時回傳 null；失敗時回傳含 AuditSinkError 的 outcome 並記錄警告
 */
export async function recordEvaluation(
  sink: AuditSink | null,
  record: EvaluationRecord,
): Promise<AuditOutcome | null> {
  if (!sink) return null;

  let outcome: AuditOutcome;
  try {
    outcome = await sink.append(record);
  } catch (err) {
    outcome = { ok: false, error: new AuditSinkError(sink.name, errorMessage(err)) };
  }

  if (!outcome.ok) {
    console.warn(`[auditSink] 評估 ${record.evaluationId} 稽核紀錄寫入失敗:`, outcome.error.message);
  }
  return outcome;
}
