/**
 * 測試：featureEncoder — 基準類別、dummy 編碼、無對應係數層級、資料驗證
 */

import { encode, explainEncoding } from '../services/affordability/featureEncoder';
import { loadModelRegistry } from '../config/modelRegistry';
import { DEFAULT_MODEL_DATA_DIR } from '../config/runtimeConfig';
import { EncodingSchema, RespondentProfile } from '../models/affordability';
import { EncodingRule } from '../models/enums';
import { InvalidProfileError } from '../models/errors';

// ─── Fixture helpers ────────────────────────────────────────────

const registry = loadModelRegistry(DEFAULT_MODEL_DATA_DIR, 'english-v1');
const english = registry.get('english-v1').schema;
const bilingual = registry.get('bilingual-v2').schema;

function baselineSelections(schema: EncodingSchema): Record<string, string> {
  return Object.fromEntries(schema.groups.map((g) => [g.key, g.options[g.baselineIndex] ?? '']));
}

function makeProfile(
  schema: EncodingSchema,
  overrides: Record<string, string> = {},
  age = 38,
): RespondentProfile {
  return { age, selections: { ...baselineSelections(schema), ...overrides } };
}

function nonZero(vector: Readonly<Record<string, number>>): Record<string, number> {
  return Object.fromEntries(Object.entries(vector).filter(([, v]) => v !== 0));
}

// ─── 基準類別 ───────────────────────────────────────────────────

describe('encode — 全部基準類別', () => {
  test('只有 Constant 與 Umur 非 0', () => {
    const vector = encode(makeProfile(english), english);
    expect(nonZero(vector)).toEqual({ Umur: 38, Constant: 1 });
  });

  test('特徵向量 key 集合 = 係數表 key 集合（依係數表順序）', () => {
    const vector = encode(makeProfile(english), english);
    expect(Object.keys(vector)).toEqual([...english.featureNames]);
    expect(Object.keys(vector)).toHaveLength(54);
  });

  test('特徵向量不可變', () => {
    const vector = encode(makeProfile(english), english);
    expect(Object.isFrozen(vector)).toBe(true);
  });

  test('每個群組規則皆為 BASELINE', () => {
    const groups = explainEncoding(makeProfile(english), english);
    expect(groups.every((g) => g.rule === EncodingRule.BASELINE && g.feature === null)).toBe(true);
  });
});

// ─── dummy 編碼 ─────────────────────────────────────────────────

describe('encode — 非基準類別', () => {
  test('Woman → Jantina ketua keluarga(1) = 1', () => {
    const vector = encode(makeProfile(english, { gender: 'Woman' }), english);
    expect(nonZero(vector)).toEqual({ Umur: 38, 'Jantina ketua keluarga(1)': 1, Constant: 1 });
  });

  test('Occupation = Student（index 5）→ Pekerjaan(5)', () => {
    const vector = encode(makeProfile(english, { occupation: 'Student' }), english);
    expect(vector['Pekerjaan(5)']).toBe(1);
    expect(vector['Pekerjaan(4)']).toBe(0);
  });

  test('Known SMART SEWA = No → SMART sewa(1)', () => {
    const vector = encode(makeProfile(english, { knowsSmartSewa: 'No' }), english);
    expect(
      vector['Adakah anda mengetahui terdapat skim mampu sewa di Malaysia? (contoh: SMART sewa)(1)'],
    ).toBe(1);
  });

  test('改變單一群組只影響該群組的 dummy（編碼獨立性）', () => {
    const base = encode(makeProfile(english), english);
    for (const group of english.groups) {
      const owned = new Set(group.levelFeatures.filter((f): f is string => f !== null));
      group.options.forEach((option, i) => {
        if (i === group.baselineIndex) return;
        const vector = encode(makeProfile(english, { [group.key]: option }), english);
        const changed = Object.keys(vector).filter((k) => vector[k] !== base[k]);
        expect(changed.every((k) => owned.has(k))).toBe(true);
        expect(changed.length).toBeLessThanOrEqual(1);
      });
    }
  });

  test('年齡直接帶入 Umur', () => {
    expect(encode(makeProfile(english, {}, 62), english)['Umur']).toBe(62);
  });
});

// ─── 無對應係數的層級 ───────────────────────────────────────────

describe('encode — 無對應係數層級視同基準類別', () => {
  test('One-unit house（第 8 個選項）→ 所有 Jenis rumah sewa 為 0', () => {
    const profile = makeProfile(english, { rentalHousingType: 'One-unit house' });
    expect(encode(profile, english)).toEqual(encode(makeProfile(english), english));

    const rental = explainEncoding(profile, english).find((g) => g.groupKey === 'rentalHousingType');
    expect(rental).toEqual({
      groupKey: 'rentalHousingType',
      option: 'One-unit house',
      optionIndex: 7,
      rule: EncodingRule.UNMAPPED_LEVEL_AS_BASELINE,
      feature: null,
    });
  });

  test('Condominium（index 4）→ Jenis rumah sewa(4)', () => {
    const vector = encode(makeProfile(english, { rentalHousingType: 'Condominium' }), english);
    expect(vector['Jenis rumah sewa(4)']).toBe(1);
  });

  test('bilingual-v2：furnished → Jenis kelengkapan perabot(1)', () => {
    const vector = encode(makeProfile(bilingual, { furnishing: 'furnished' }), bilingual);
    expect(vector['Jenis kelengkapan perabot(1)']).toBe(1);
  });

  test('bilingual-v2：furnishing 選 "2 + 1" → 無 dummy', () => {
    const profile = makeProfile(bilingual, { furnishing: '2 + 1' });
    expect(nonZero(encode(profile, bilingual))).toEqual({ Umur: 38, Constant: 1 });
    const furnishing = explainEncoding(profile, bilingual).find((g) => g.groupKey === 'furnishing');
    expect(furnishing?.rule).toBe(EncodingRule.UNMAPPED_LEVEL_AS_BASELINE);
  });
});

// ─── 資料驗證 ───────────────────────────────────────────────────

describe('encode — 不合法資料', () => {
  test.each([14, 101])('年齡 %p 超出 15-100 → InvalidProfileError（不截斷）', (age) => {
    expect(() => encode(makeProfile(english, {}, age), english)).toThrow(InvalidProfileError);
  });

  test('邊界年齡 15 與 100 可接受', () => {
    expect(encode(makeProfile(english, {}, 15), english)['Umur']).toBe(15);
    expect(encode(makeProfile(english, {}, 100), english)['Umur']).toBe(100);
  });

  test('年齡非整數 → InvalidProfileError', () => {
    expect(() => encode(makeProfile(english, {}, 38.5), english)).toThrow('Age (years) must be a whole number');
  });

  test('選項不在值域 → InvalidProfileError，field 指向群組', () => {
    let caught: unknown;
    try {
      encode(makeProfile(english, { religion: 'Jedi' }), english);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidProfileError);
    expect(caught instanceof InvalidProfileError && caught.field).toBe('religion');
    expect(caught instanceof InvalidProfileError && caught.message).toBe(
      'Religion must be one of Islam / Buddhism / Hinduism / Others',
    );
  });

  test('bilingual-v2 標籤不適用於 english-v1', () => {
    expect(() => encode(makeProfile(english, { religion: 'Buddha' }), english)).toThrow(InvalidProfileError);
  });

  test('缺少群組 → InvalidProfileError', () => {
    const { gender: _omit, ...rest } = baselineSelections(english);
    expect(() => encode({ age: 38, selections: rest }, english)).toThrow('Gender is required');
  });

  test('未知欄位 → InvalidProfileError', () => {
    expect(() => encode(makeProfile(english, { favouriteColour: 'Purple' }), english)).toThrow(
      'Unknown field(s) for schema "english-v1": favouriteColour',
    );
  });
});
