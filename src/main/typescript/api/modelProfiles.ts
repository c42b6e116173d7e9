/**
 * INPUT: GET /api/model-profiles
 * OUTPUT: { success: true, data: ModelProfileSummary[] }
 * POS: API 層，提供表單下拉選單所需的欄位、選項與年齡範圍
 */

import { Router, Request, Response } from 'express';
import { ModelProfile } from '../models/affordability';
import { getModelRegistry } from '../core/modelContext';

export const modelProfilesRouter = Router();

export interface ModelProfileSummary {
  id: string;
  version: number;
  description: string;
  coefficientTableId: string;
  isDefault: boolean;
  age: { key: string; label: string; min: number; max: number };
  fields: Array<{ key: string; label: string; options: readonly string[]; baselineOption: string }>;
}

function summarize(profile: ModelProfile, defaultId: string): ModelProfileSummary {
  const { schema } = profile;
  return {
    id: schema.id,
    version: schema.version,
    description: schema.description,
    coefficientTableId: schema.coefficientTableId,
    isDefault: schema.id === defaultId,
    age: { key: schema.age.key, label: schema.age.label, min: schema.age.min, max: schema.age.max },
    fields: schema.groups.map((g) => ({
      key: g.key,
      label: g.label,
      options: g.options,
      baselineOption: g.options[g.baselineIndex] ?? '',
    })),
  };
}

modelProfilesRouter.get('/model-profiles', (_req: Request, res: Response): void => {
  try {
    const registry = getModelRegistry();
    res.json({
      success: true,
      data: registry.list().map((p) => summarize(p, registry.defaultProfileId)),
    });
  } catch (err) {
    console.error('[modelProfiles] 讀取模型設定失敗:', err);
    res.status(500).json({
      success: false,
      message: 'Model profiles are unavailable',
      error: err instanceof Error ? err.message : String(err),
    });
  }
});
