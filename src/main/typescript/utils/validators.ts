/**
 * INPUT: HTTP 請求體（未知型別 JSON）
 * OUTPUT: EvaluationRequest 或錯誤訊息
 * POS: 工具模組，只檢查欄位形狀；選項值域與年齡範圍由 featureEncoder 依 schema 驗證
 */

import { EvaluationRequest } from '../models/affordability';
import { isRecord } from './guards';

type ParseResult = { valid: true; request: EvaluationRequest } | { valid: false; error: string };

const NUMERIC_FIELDS = ['income', 'rent', 'rentRatio', 'probabilityThreshold'] as const;

function parseSelections(raw: unknown): Record<string, string> | string {
  if (!isRecord(raw)) return 'profile.selections must be an object';
  const entries: [string, string][] = [];
  for (const [key, val] of Object.entries(raw)) {
    if (typeof val !== 'string') return `profile.selections.${key} must be a string`;
    entries.push([key, val]);
  }
  // fromEntries 保留 "__proto__" 等鍵為自有屬性，交由 encoder 判定為未知欄位
  return Object.fromEntries(entries);
}

/** 驗證評估請求體 */
export function parseEvaluationRequest(body: unknown): ParseResult {
  if (!isRecord(body)) {
    return { valid: false, error: 'Request body must be a JSON object' };
  }

  const rawProfileId = body['profileId'];
  let profileId: string | undefined;
  if (rawProfileId !== undefined) {
    if (typeof rawProfileId !== 'string' || !rawProfileId) {
      return { valid: false, error: 'profileId must be a non-empty string when given' };
    }
    profileId = rawProfileId;
  }

  const profile = body['profile'];
  if (!isRecord(profile)) {
    return { valid: false, error: 'profile is required' };
  }
  const age = profile['age'];
  if (typeof age !== 'number') {
    return { valid: false, error: 'profile.age must be a number' };
  }
  const selections = parseSelections(profile['selections']);
  if (typeof selections === 'string') {
    return { valid: false, error: selections };
  }

  const numbers: Record<(typeof NUMERIC_FIELDS)[number], number> = {
    income: 0,
    rent: 0,
    rentRatio: 0,
    probabilityThreshold: 0,
  };
  const missing: string[] = [];
  for (const field of NUMERIC_FIELDS) {
    const val = body[field];
    if (typeof val !== 'number') {
      missing.push(field);
    } else {
      numbers[field] = val;
    }
  }
  if (missing.length > 0) {
    return { valid: false, error: `Missing or non-numeric field(s): ${missing.join(', ')}` };
  }

  return {
    valid: true,
    request: {
      ...(profileId === undefined ? {} : { profileId }),
      profile: { age, selections },
      ...numbers,
    },
  };
}
