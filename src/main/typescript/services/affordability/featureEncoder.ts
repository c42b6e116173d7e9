/**
 * INPUT: RespondentProfile、EncodingSchema
 * OUTPUT: FeatureVector（key 集合 = 綁定係數表的全部特徵）、各群組編碼說明
 * POS: 服務層，受訪者資料 → 特徵向量（年齡直接帶入、Constant = 1、類別變數 dummy 編碼）
 */

import {
  CategoricalGroup,
  EncodingSchema,
  FeatureVector,
  GroupEncoding,
  RespondentProfile,
} from '../../models/affordability';
import { EncodingRule } from '../../models/enums';
import { InvalidProfileError } from '../../models/errors';

// ─── 驗證 ──────────────────────────────────────────────────────

/**
 * 年齡超出 schema 範圍一律拒絕，不做截斷（clamp）
 */
function validateAge(profile: RespondentProfile, schema: EncodingSchema): void {
  const { key, label, min, max } = schema.age;
  const age = profile.age;
  if (typeof age !== 'number' || !Number.isInteger(age)) {
    throw new InvalidProfileError(key, `${label} must be a whole number`);
  }
  if (age < min || age > max) {
    throw new InvalidProfileError(key, `${label} must be between ${min} and ${max}`);
  }
}

function validateSelectionKeys(profile: RespondentProfile, schema: EncodingSchema): void {
  const known = new Set(schema.groups.map((g) => g.key));
  const unknown = Object.keys(profile.selections).filter((k) => !known.has(k));
  if (unknown.length > 0) {
    throw new InvalidProfileError(unknown[0] ?? '', `Unknown field(s) for schema "${schema.id}": ${unknown.join(', ')}`);
  }
}

function encodeGroup(group: CategoricalGroup, profile: RespondentProfile): GroupEncoding {
  const option = profile.selections[group.key];
  if (option === undefined) {
    throw new InvalidProfileError(group.key, `${group.label} is required`);
  }
  const optionIndex = group.options.indexOf(option);
  if (optionIndex < 0) {
    throw new InvalidProfileError(
      group.key,
      `${group.label} must be one of ${group.options.join(' / ')}`,
    );
  }

  if (optionIndex === group.baselineIndex) {
    return { groupKey: group.key, option, optionIndex, rule: EncodingRule.BASELINE, feature: null };
  }
  const feature = group.levelFeatures[optionIndex] ?? null;
  if (feature === null) {
    return {
      groupKey: group.key,
      option,
      optionIndex,
      rule: EncodingRule.UNMAPPED_LEVEL_AS_BASELINE,
      feature: null,
    };
  }
  return { groupKey: group.key, option, optionIndex, rule: EncodingRule.DUMMY, feature };
}

// ─── 主要 Export ──────────────────────────────────────────────

/**
 * 逐群組說明編碼結果（同時完成資料驗證）
 * @throws InvalidProfileError 欄位不在 schema、缺欄位、選項不在值域、年齡超出範圍
 */
export function explainEncoding(profile: RespondentProfile, schema: EncodingSchema): GroupEncoding[] {
  validateAge(profile, schema);
  validateSelectionKeys(profile, schema);
  return schema.groups.map((group) => encodeGroup(group, profile));
}

/**
 * 建立特徵向量
 * - 所有特徵預設 0.0
 * - 年齡特徵 = 年齡數值、Constant = 1.0
 * - 每群組至多一個 dummy = 1.0（基準類別或無對應係數的層級則全為 0）
 */
export function encode(profile: RespondentProfile, schema: EncodingSchema): FeatureVector {
  const groups = explainEncoding(profile, schema);

  const vector: Record<string, number> = {};
  for (const name of schema.featureNames) vector[name] = 0;
  vector[schema.age.feature] = profile.age;
  vector[schema.constantFeature] = 1;
  for (const g of groups) {
    if (g.feature !== null) vector[g.feature] = 1;
  }
  return Object.freeze(vector);
}
