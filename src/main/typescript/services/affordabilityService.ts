/**
 * INPUT: EvaluationInput（受訪者資料、收入、租金、門檻、係數表、schema）
 * OUTPUT: AffordabilityVerdict（Condition A / B / Overall + z、p、thresholdRM、明細表）
 * POS: 服務層，整合 featureEncoder / scorer / rentRatioChecker，並產生稽核紀錄
 */

import { randomUUID } from 'crypto';
import {
  AffordabilityVerdict,
  EvaluationInput,
  EvaluationRecord,
  EvaluationRequest,
  GroupEncoding,
  RespondentProfile,
} from '../models/affordability';
import { toLabel } from '../models/enums';
import { InvalidEncodingSchemaError, InvalidProfileError } from '../models/errors';
import { ModelRegistry } from '../config/modelRegistry';
import { encode, explainEncoding } from './affordability/featureEncoder';
import { buildBreakdown, scoreBreakdown } from './affordability/scorer';
import { checkRentRatio } from './affordability/rentRatioChecker';

// ─── 數值參數驗證 ──────────────────────────────────────────────

function requireNonNegative(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidProfileError(field, `${field} must be a finite number >= 0`);
  }
}

function requireUnitInterval(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidProfileError(field, `${field} must be between 0 and 1`);
  }
}

// ─── 主服務函數 ──────────────────────────────────────────────

/**
 * 執行可負擔評估
 * 1. encode → 2. score → 3. conditionA = p ≥ probabilityThreshold
 * 4. thresholdRM = rentRatio × income → 5. conditionB = rent ≤ thresholdRM
 * 6. overall = conditionA AND conditionB
 * Condition A 不通過仍計算 Condition B，兩者皆回報。
 */
export function evaluate(input: EvaluationInput): AffordabilityVerdict {
  const { profile, income, rent, probabilityThreshold, rentRatio, coefficients, schema } = input;

  if (schema.coefficientTableId !== coefficients.id) {
    throw new InvalidEncodingSchemaError(
      schema.id,
      `is bound to coefficient table "${schema.coefficientTableId}", got "${coefficients.id}"`,
    );
  }
  // 同 id 但內容不同的係數表亦視為不相符（特徵名稱與順序須一致）
  const tableFeatures = coefficients.entries.map((e) => e.feature);
  if (
    tableFeatures.length !== schema.featureNames.length ||
    tableFeatures.some((name, i) => name !== schema.featureNames[i])
  ) {
    throw new InvalidEncodingSchemaError(
      schema.id,
      `features of coefficient table "${coefficients.id}" differ from the table the schema was loaded with`,
    );
  }
  requireNonNegative('income', income);
  requireNonNegative('rent', rent);
  requireUnitInterval('rentRatio', rentRatio);
  requireUnitInterval('probabilityThreshold', probabilityThreshold);

  const features = encode(profile, schema);
  const breakdown = buildBreakdown(features, coefficients);
  const { z, p } = scoreBreakdown(breakdown);

  const conditionA = p >= probabilityThreshold;
  const ratio = checkRentRatio(income, rent, rentRatio);
  const conditionB = ratio.pass;
  const overall = conditionA && conditionB;

  return Object.freeze({
    schemaId: schema.id,
    coefficientTableId: coefficients.id,
    conditionA,
    conditionB,
    overall,
    labels: Object.freeze({
      conditionA: toLabel(conditionA),
      conditionB: toLabel(conditionB),
      overall: toLabel(overall),
    }),
    z,
    p,
    probabilityThreshold,
    rentRatio,
    income,
    rent,
    thresholdRM: ratio.thresholdRM,
    breakdown: Object.freeze(breakdown),
  });
}

export interface ProfileEvaluation {
  verdict: AffordabilityVerdict;
  encoding: GroupEncoding[];
  profile: RespondentProfile;
}

/**
 * 以 registry 中的 model profile 評估 API 請求
 * @throws UnknownModelProfileError profileId 未載入
 */
export function evaluateWithProfile(request: EvaluationRequest, registry: ModelRegistry): ProfileEvaluation {
  const { schema, coefficients } = registry.get(request.profileId);
  const verdict = evaluate({
    profile: request.profile,
    income: request.income,
    rent: request.rent,
    probabilityThreshold: request.probabilityThreshold,
    rentRatio: request.rentRatio,
    coefficients,
    schema,
  });
  return { verdict, encoding: explainEncoding(request.profile, schema), profile: request.profile };
}

/** 建立稽核紀錄 */
export function buildEvaluationRecord(
  verdict: AffordabilityVerdict,
  profile: RespondentProfile,
  evaluatedAt: Date = new Date(),
  evaluationId: string = randomUUID(),
): EvaluationRecord {
  return {
    evaluationId,
    evaluatedAt: evaluatedAt.toISOString(),
    schemaId: verdict.schemaId,
    coefficientTableId: verdict.coefficientTableId,
    profile: { age: profile.age, selections: { ...profile.selections } },
    income: verdict.income,
    rent: verdict.rent,
    rentRatio: verdict.rentRatio,
    thresholdRM: verdict.thresholdRM,
    probabilityThreshold: verdict.probabilityThreshold,
    z: verdict.z,
    p: verdict.p,
    conditionA: verdict.conditionA,
    conditionB: verdict.conditionB,
    overall: verdict.overall,
  };
}
