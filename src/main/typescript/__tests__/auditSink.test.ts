/**
 * 測試：auditSink — JSON Lines 檔案、webhook、recordEvaluation 失敗不外拋
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  AuditSink,
  createAuditSink,
  JsonLinesAuditSink,
  recordEvaluation,
  WebhookAuditSink,
} from '../services/auditSink';
import { EvaluationRecord } from '../models/affordability';
import { AuditSinkError } from '../models/errors';

const RECORD: EvaluationRecord = {
  evaluationId: 'eval-1',
  evaluatedAt: '2026-01-15T08:00:00.000Z',
  schemaId: 'english-v1',
  coefficientTableId: 'rental-logit-v1',
  profile: { age: 38, selections: { gender: 'Male' } },
  income: 6_000,
  rent: 2_000,
  rentRatio: 0.38,
  thresholdRM: 2_280,
  probabilityThreshold: 0.5,
  z: 38.728,
  p: 1,
  conditionA: true,
  conditionB: true,
  overall: true,
};

const WEBHOOK_URL = 'https://audit.example.test/records';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'audit-sink-'));
});

afterEach(() => {
  jest.restoreAllMocks();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ─── JsonLinesAuditSink ─────────────────────────────────────────

describe('JsonLinesAuditSink', () => {
  test('建立目錄並逐行附加', async () => {
    const file = path.join(tmpDir, 'nested', 'audit.jsonl');
    const sink = new JsonLinesAuditSink(file);

    await expect(sink.append(RECORD)).resolves.toEqual({ ok: true });
    await expect(sink.append({ ...RECORD, evaluationId: 'eval-2' })).resolves.toEqual({ ok: true });

    const lines = fs.readFileSync(file, 'utf-8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    expect(JSON.parse(lines[0] ?? '')).toEqual(RECORD);
    expect(JSON.parse(lines[1] ?? '')).toEqual({ ...RECORD, evaluationId: 'eval-2' });
  });

  test('無法寫入 → ok: false（不拋出）', async () => {
    const blocker = path.join(tmpDir, 'blocker');
    fs.writeFileSync(blocker, '');
    const file = path.join(blocker, 'audit.jsonl');

    const outcome = await new JsonLinesAuditSink(file).append(RECORD);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(AuditSinkError);
    expect(outcome.error.code).toBe('AUDIT_SINK_FAILED');
    expect(outcome.error.sink).toBe('jsonl');
    expect(outcome.error.message.startsWith(`無法寫入稽核檔 ${file}：`)).toBe(true);
  });
});

// ─── WebhookAuditSink ───────────────────────────────────────────

describe('WebhookAuditSink', () => {
  function mockFetch(): jest.Mock<ReturnType<typeof fetch>, Parameters<typeof fetch>> {
    return jest.fn<ReturnType<typeof fetch>, Parameters<typeof fetch>>();
  }

  test('POST JSON 並帶 Bearer token', async () => {
    const fetchImpl = mockFetch().mockResolvedValue(new Response(null, { status: 204 }));
    const sink = new WebhookAuditSink(WEBHOOK_URL, 'test-secret', 1_000, fetchImpl);

    await expect(sink.append(RECORD)).resolves.toEqual({ ok: true });
    expect(fetchImpl).toHaveBeenCalledWith(WEBHOOK_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
      body: JSON.stringify(RECORD),
      signal: expect.any(AbortSignal),
    });
  });

  test('未設定 token → 不送 Authorization', async () => {
    const fetchImpl = mockFetch().mockResolvedValue(new Response('ok', { status: 200 }));
    await new WebhookAuditSink(WEBHOOK_URL, null, 1_000, fetchImpl).append(RECORD);
    expect(fetchImpl.mock.calls[0]?.[1]?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  test('端點回傳 500 → ok: false 並附回應內容', async () => {
    const fetchImpl = mockFetch().mockResolvedValue(new Response('sheet locked', { status: 500 }));
    const outcome = await new WebhookAuditSink(WEBHOOK_URL, 'test-secret', 1_000, fetchImpl).append(RECORD);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.message).toBe('稽核端點回傳錯誤 500：sheet locked');
    expect(outcome.error.sink).toBe('webhook');
  });

  test('連線失敗 → ok: false', async () => {
    const fetchImpl = mockFetch().mockRejectedValue(new Error('connect ECONNREFUSED'));
    const outcome = await new WebhookAuditSink(WEBHOOK_URL, null, 1_000, fetchImpl).append(RECORD);
    expect(outcome).toEqual({ ok: false, error: expect.any(AuditSinkError) });
    if (outcome.ok) return;
    expect(outcome.error.message).toBe('稽核端點無法連線：connect ECONNREFUSED');
  });
});

describe('WebhookAuditSink — 逾時', () => {
  test('端點無回應 → 逾時中止，ok: false', async () => {
    const fetchImpl = jest.fn<ReturnType<typeof fetch>, Parameters<typeof fetch>>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (signal) signal.addEventListener('abort', () => reject(signal.reason));
        }),
    );
    const outcome = await new WebhookAuditSink(WEBHOOK_URL, null, 20, fetchImpl).append(RECORD);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.message).toBe('稽核端點逾時（20 ms）');
  });
});

// ─── recordEvaluation / createAuditSink ─────────────────────────

describe('recordEvaluation', () => {
  test('未設定 sink → null', async () => {
    await expect(recordEvaluation(null, RECORD)).resolves.toBeNull();
  });

  test('成功 → 不記錄警告', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const sink: AuditSink = { name: 'memory', append: jest.fn().mockResolvedValue({ ok: true }) };
    await expect(recordEvaluation(sink, RECORD)).resolves.toEqual({ ok: true });
    expect(sink.append).toHaveBeenCalledWith(RECORD);
    expect(warn).not.toHaveBeenCalled();
  });

  test('sink 回傳失敗 → 記錄警告', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = new AuditSinkError('memory', 'quota exceeded');
    const sink: AuditSink = { name: 'memory', append: jest.fn().mockResolvedValue({ ok: false, error }) };

    await expect(recordEvaluation(sink, RECORD)).resolves.toEqual({ ok: false, error });
    expect(warn).toHaveBeenCalledWith('[auditSink] 評估 eval-1 稽核紀錄寫入失敗:', 'quota exceeded');
  });

  test('sink 違約拋出 → 轉為 AuditSinkError，不外拋', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const sink: AuditSink = { name: 'memory', append: jest.fn().mockRejectedValue(new Error('disk gone')) };

    const outcome = await recordEvaluation(sink, RECORD);
    expect(outcome?.ok).toBe(false);
    if (!outcome || outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(AuditSinkError);
    expect(outcome.error.sink).toBe('memory');
    expect(outcome.error.message).toBe('disk gone');
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('createAuditSink', () => {
  test('none → null', () => {
    expect(createAuditSink({ kind: 'none' })).toBeNull();
  });

  test('file → JsonLinesAuditSink', () => {
    const sink = createAuditSink({ kind: 'file', filePath: path.join(tmpDir, 'a.jsonl') });
    expect(sink).toBeInstanceOf(JsonLinesAuditSink);
    expect(sink?.name).toBe('jsonl');
  });

  test('webhook → WebhookAuditSink', () => {
    const sink = createAuditSink({ kind: 'webhook', url: WEBHOOK_URL, token: 'test-secret', timeoutMs: 5_000 });
    expect(sink).toBeInstanceOf(WebhookAuditSink);
    expect(sink?.name).toBe('webhook');
  });
});
