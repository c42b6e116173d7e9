/**
 * INPUT: data/coefficients/*.json
 * OUTPUT: 驗證後、凍結的 CoefficientTable
 * POS: 設定層，係數表載入與驗證（特徵名稱非空、權重為有限數、無重複、含 Constant）
 */

import * as fs from 'fs';
import { CoefficientEntry, CoefficientTable } from '../models/affordability';
import { InvalidCoefficientTableError } from '../models/errors';
import { isFiniteNumber, isNonEmptyString, isRecord } from '../utils/guards';

/** 截距項特徵名稱 */
export const CONSTANT_FEATURE = 'Constant';

/** 驗證並建立係數表，任一項不合法即拋出 InvalidCoefficientTableError */
export function parseCoefficientTable(raw: unknown): CoefficientTable {
  if (!isRecord(raw)) {
    throw new InvalidCoefficientTableError('?', 'table must be a JSON object');
  }
  const id = raw['id'];
  if (!isNonEmptyString(id)) {
    throw new InvalidCoefficientTableError('?', 'id must be a non-empty string');
  }
  const description = typeof raw['description'] === 'string' ? raw['description'] : '';
  const rawEntries = raw['entries'];
  if (!Array.isArray(rawEntries) || rawEntries.length === 0) {
    throw new InvalidCoefficientTableError(id, 'entries must be a non-empty array');
  }

  const seen = new Set<string>();
  const entries: CoefficientEntry[] = rawEntries.map((entry: unknown, i: number) => {
    if (!isRecord(entry)) {
      throw new InvalidCoefficientTableError(id, `entry #${i} must be an object`);
    }
    const feature = entry['feature'];
    const weight = entry['weight'];
    if (!isNonEmptyString(feature)) {
      throw new InvalidCoefficientTableError(id, `entry #${i} has an empty feature name`);
    }
    if (!isFiniteNumber(weight)) {
      throw new InvalidCoefficientTableError(id, `weight of "${feature}" is not a finite number`);
    }
    if (seen.has(feature)) {
      throw new InvalidCoefficientTableError(id, `duplicate feature "${feature}"`);
    }
    seen.add(feature);
    return Object.freeze({ feature, weight });
  });

  if (!seen.has(CONSTANT_FEATURE)) {
    throw new InvalidCoefficientTableError(id, `missing "${CONSTANT_FEATURE}" entry`);
  }

  return Object.freeze({ id, description, entries: Object.freeze(entries) });
}

/** 從 JSON 檔讀取係數表 */
export function readCoefficientTable(filePath: string): CoefficientTable {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return parseCoefficientTable(raw);
}
