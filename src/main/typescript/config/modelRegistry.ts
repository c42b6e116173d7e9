/**
 * INPUT: MODEL_DATA_DIR（coefficients/*.json、schemas/*.json）
 * OUTPUT: ModelRegistry — 以 schema id 查詢 ModelProfile（schema + 係數表）
 * POS: 設定層，啟動時一次載入全部模型設定；各版本 schema 並存，無「正式版」之分
 */

import * as fs from 'fs';
import * as path from 'path';
import { CoefficientTable, ModelProfile } from '../models/affordability';
import {
  InvalidCoefficientTableError,
  InvalidEncodingSchemaError,
  UnknownModelProfileError,
} from '../models/errors';
import { readCoefficientTable } from './coefficientTableLoader';
import { parseEncodingSchema, peekCoefficientTableId, readSchemaJson } from './encodingSchemaLoader';

export class ModelRegistry {
  private readonly profiles: ReadonlyMap<string, ModelProfile>;

  constructor(profiles: readonly ModelProfile[], public readonly defaultProfileId: string) {
    const map = new Map<string, ModelProfile>();
    for (const profile of profiles) {
      if (map.has(profile.schema.id)) {
        throw new InvalidEncodingSchemaError(profile.schema.id, 'schema id is declared twice');
      }
      map.set(profile.schema.id, profile);
    }
    this.profiles = map;
    if (!map.has(defaultProfileId)) {
      throw new UnknownModelProfileError(defaultProfileId, [...map.keys()]);
    }
  }

  /** 取得指定 profile；未指定時回傳預設 profile */
  get(profileId?: string): ModelProfile {
    const id = profileId ?? this.defaultProfileId;
    const profile = this.profiles.get(id);
    if (!profile) throw new UnknownModelProfileError(id, [...this.profiles.keys()]);
    return profile;
  }

  list(): ModelProfile[] {
    return [...this.profiles.values()];
  }
}

function listJsonFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.json'))
    .sort()
    .map((f) => path.join(dir, f));
}

/**
 * 載入資料目錄下所有係數表與 schema
 * 任一檔案驗證失敗即拋出（啟動失敗，不靜默略過）
 */
export function loadModelRegistry(dataDir: string, defaultProfileId: string): ModelRegistry {
  const tables = new Map<string, CoefficientTable>();
  for (const file of listJsonFiles(path.join(dataDir, 'coefficients'))) {
    const table = readCoefficientTable(file);
    if (tables.has(table.id)) {
      throw new InvalidCoefficientTableError(table.id, `id is declared twice (${file})`);
    }
    tables.set(table.id, table);
  }

  const profiles: ModelProfile[] = listJsonFiles(path.join(dataDir, 'schemas')).map((file) => {
    const raw = readSchemaJson(file);
    const tableId = peekCoefficientTableId(raw);
    const coefficients = tableId === null ? undefined : tables.get(tableId);
    if (!coefficients) {
      throw new InvalidEncodingSchemaError(
        path.basename(file, '.json'),
        `coefficient table "${tableId ?? '(none)'}" was not found under ${dataDir}`,
      );
    }
    return { schema: parseEncodingSchema(raw, coefficients), coefficients };
  });

  console.log(
    `[modelRegistry] 已載入 ${tables.size} 張係數表、${profiles.length} 個 schema（預設：${defaultProfileId}）`,
  );
  return new ModelRegistry(profiles, defaultProfileId);
}
