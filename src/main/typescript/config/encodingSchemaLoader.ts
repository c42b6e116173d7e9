/**
 * INPUT: data/schemas/*.json、已載入的 CoefficientTable
 * OUTPUT: 驗證後、綁定係數表的 EncodingSchema
 * POS: 設定層，編碼 schema 載入與驗證；引用的特徵必須存在於綁定係數表
 */

import * as fs from 'fs';
import { AgeField, CategoricalGroup, CoefficientTable, EncodingSchema } from '../models/affordability';
import { InvalidEncodingSchemaError } from '../models/errors';
import { isFiniteNumber, isNonEmptyString, isRecord } from '../utils/guards';

// ─── 欄位解析輔助 ──────────────────────────────────────────────

function parseAgeField(schemaId: string, raw: unknown, features: ReadonlySet<string>): AgeField {
  if (!isRecord(raw)) {
    throw new InvalidEncodingSchemaError(schemaId, 'age must be an object');
  }
  const { key, label, feature, min, max } = raw;
  if (!isNonEmptyString(key) || !isNonEmptyString(label) || !isNonEmptyString(feature)) {
    throw new InvalidEncodingSchemaError(schemaId, 'age.key, age.label and age.feature are required strings');
  }
  if (!features.has(feature)) {
    throw new InvalidEncodingSchemaError(schemaId, `age feature "${feature}" is not in the coefficient table`);
  }
  if (!isFiniteNumber(min) || !isFiniteNumber(max) || !Number.isInteger(min) || !Number.isInteger(max) || min > max) {
    throw new InvalidEncodingSchemaError(schemaId, 'age.min / age.max must be integers with min <= max');
  }
  return Object.freeze({ key, label, feature, min, max });
}

function parseGroup(
  schemaId: string,
  raw: unknown,
  index: number,
  features: ReadonlySet<string>,
  reserved: ReadonlySet<string>,
): CategoricalGroup {
  if (!isRecord(raw)) {
    throw new InvalidEncodingSchemaError(schemaId, `group #${index} must be an object`);
  }
  const { key, label, options, baselineIndex, levelFeatures } = raw;
  if (!isNonEmptyString(key) || !isNonEmptyString(label)) {
    throw new InvalidEncodingSchemaError(schemaId, `group #${index} needs a key and a label`);
  }
  if (!Array.isArray(options) || options.length < 2 || !options.every(isNonEmptyString)) {
    throw new InvalidEncodingSchemaError(schemaId, `group "${key}" needs at least two non-empty options`);
  }
  const optionList: string[] = options.filter(isNonEmptyString);
  if (new Set(optionList).size !== optionList.length) {
    throw new InvalidEncodingSchemaError(schemaId, `group "${key}" has duplicate option labels`);
  }
  if (!isFiniteNumber(baselineIndex) || !Number.isInteger(baselineIndex) || baselineIndex < 0 || baselineIndex >= optionList.length) {
    throw new InvalidEncodingSchemaError(schemaId, `group "${key}" baselineIndex is out of range`);
  }
  if (!Array.isArray(levelFeatures) || levelFeatures.length !== optionList.length) {
    throw new InvalidEncodingSchemaError(schemaId, `group "${key}" levelFeatures must list one entry per option`);
  }

  const mapped: (string | null)[] = levelFeatures.map((val: unknown, i: number) => {
    if (val === null) return null;
    if (!isNonEmptyString(val)) {
      throw new InvalidEncodingSchemaError(schemaId, `group "${key}" levelFeatures[${i}] must be a feature name or null`);
    }
    if (i === baselineIndex) {
      throw new InvalidEncodingSchemaError(schemaId, `group "${key}" baseline option must not activate "${val}"`);
    }
    if (!features.has(val)) {
      throw new InvalidEncodingSchemaError(schemaId, `group "${key}" references "${val}", which is not in the coefficient table`);
    }
    if (reserved.has(val)) {
      throw new InvalidEncodingSchemaError(schemaId, `group "${key}" cannot activate reserved feature "${val}"`);
    }
    return val;
  });

  return Object.freeze({
    key,
    label,
    options: Object.freeze(optionList),
    baselineIndex,
    levelFeatures: Object.freeze(mapped),
  });
}

// ─── 主要 Export ──────────────────────────────────────────────

/**
 * 驗證 schema 並綁定係數表
 * 規則：所有引用特徵必須存在於係數表；基準選項不得啟用特徵；
 *       同一特徵只能屬於一個群組（群組間編碼互不影響）
 */
export function parseEncodingSchema(raw: unknown, table: CoefficientTable): EncodingSchema {
  if (!isRecord(raw)) {
    throw new InvalidEncodingSchemaError('?', 'schema must be a JSON object');
  }
  const id = raw['id'];
  if (!isNonEmptyString(id)) {
    throw new InvalidEncodingSchemaError('?', 'id must be a non-empty string');
  }
  const version = raw['version'] ?? 1;
  if (!isFiniteNumber(version) || !Number.isInteger(version) || version < 1) {
    throw new InvalidEncodingSchemaError(id, 'version must be a positive integer');
  }
  const description = typeof raw['description'] === 'string' ? raw['description'] : '';
  if (raw['coefficientTable'] !== table.id) {
    throw new InvalidEncodingSchemaError(
      id,
      `is bound to coefficient table "${String(raw['coefficientTable'])}", not "${table.id}"`,
    );
  }

  const featureNames = table.entries.map((e) => e.feature);
  const features = new Set(featureNames);

  const constantFeature = raw['constantFeature'];
  if (!isNonEmptyString(constantFeature) || !features.has(constantFeature)) {
    throw new InvalidEncodingSchemaError(id, 'constantFeature must name an entry of the coefficient table');
  }
  const age = parseAgeField(id, raw['age'], features);
  if (age.feature === constantFeature) {
    throw new InvalidEncodingSchemaError(id, 'age feature and constant feature must differ');
  }

  const rawGroups = raw['groups'];
  if (!Array.isArray(rawGroups) || rawGroups.length === 0) {
    throw new InvalidEncodingSchemaError(id, 'groups must be a non-empty array');
  }
  const reserved = new Set([constantFeature, age.feature]);
  const groups = rawGroups.map((g: unknown, i: number) => parseGroup(id, g, i, features, reserved));

  const keys = new Set<string>([age.key]);
  const owner = new Map<string, string>();
  for (const group of groups) {
    if (keys.has(group.key)) {
      throw new InvalidEncodingSchemaError(id, `duplicate field key "${group.key}"`);
    }
    keys.add(group.key);
    for (const feature of group.levelFeatures) {
      if (feature === null) continue;
      const prev = owner.get(feature);
      if (prev !== undefined && prev !== group.key) {
        throw new InvalidEncodingSchemaError(id, `feature "${feature}" is shared by groups "${prev}" and "${group.key}"`);
      }
      owner.set(feature, group.key);
    }
  }

  return Object.freeze({
    id,
    version,
    description,
    coefficientTableId: table.id,
    constantFeature,
    age,
    groups: Object.freeze(groups),
    featureNames: Object.freeze(featureNames),
  });
}

/** 讀取 schema JSON 中宣告的係數表 id（載入前用於配對） */
export function peekCoefficientTableId(raw: unknown): string | null {
  if (!isRecord(raw)) return null;
  const tableId = raw['coefficientTable'];
  return isNonEmptyString(tableId) ? tableId : null;
}

/** 從 JSON 檔讀取 schema 原始內容 */
export function readSchemaJson(filePath: string): unknown {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return raw;
}
