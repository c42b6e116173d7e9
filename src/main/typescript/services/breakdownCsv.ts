/**
 * INPUT: BreakdownRow[]（或已匯出的 CSV 文字）
 * OUTPUT: 計算明細表 CSV（Variable,COEF,INPUT,COEF×INPUT）與反向解析
 * POS: 服務層，明細表下載；數值以 JavaScript 最短可還原字串輸出，重新加總可得原 z
 */

import { BreakdownRow } from '../models/affordability';

export const BREAKDOWN_CSV_HEADER = ['Variable', 'COEF', 'INPUT', 'COEF×INPUT'] as const;
export const BREAKDOWN_CSV_FILENAME = 'affordability_calculation.csv';

function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function breakdownToCsv(rows: readonly BreakdownRow[]): string {
  const lines = [
    BREAKDOWN_CSV_HEADER.join(','),
    ...rows.map((r) =>
      [escapeField(r.variable), String(r.coefficient), String(r.input), String(r.product)].join(','),
    ),
  ];
  return lines.join('\n') + '\n';
}

/** 拆解 CSV 記錄（支援雙引號包覆與 "" 跳脫） */
function splitRecords(csv: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < csv.length; i++) {
    const ch = csv.charAt(i);
    if (quoted) {
      if (ch === '"' && csv[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      record.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && csv[i + 1] === '\n') i++;
      record.push(field);
      records.push(record);
      record = [];
      field = '';
    } else {
      field += ch;
    }
  }
  if (quoted) {
    throw new Error('[breakdownCsv] 未結束的雙引號欄位');
  }
  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }
  return records;
}

function parseNumber(raw: string, line: number, column: string): number {
  const n = Number(raw);
  if (raw.trim() === '' || Number.isNaN(n)) {
    throw new Error(`[breakdownCsv] 第 ${line} 列 ${column} 不是數值：${raw}`);
  }
  return n;
}

/** 解析 breakdownToCsv 的輸出 */
export function parseBreakdownCsv(csv: string): BreakdownRow[] {
  const [header, ...body] = splitRecords(csv);
  if (!header || header.join(',') !== BREAKDOWN_CSV_HEADER.join(',')) {
    throw new Error(`[breakdownCsv] 標題列必須為 ${BREAKDOWN_CSV_HEADER.join(',')}`);
  }
  return body.map((fields, i) => {
    const line = i + 2;
    if (fields.length !== BREAKDOWN_CSV_HEADER.length) {
      throw new Error(`[breakdownCsv] 第 ${line} 列欄位數為 ${fields.length}，應為 ${BREAKDOWN_CSV_HEADER.length}`);
    }
    const [variable = '', coef = '', input = '', product = ''] = fields;
    return {
      variable,
      coefficient: parseNumber(coef, line, 'COEF'),
      input: parseNumber(input, line, 'INPUT'),
      product: parseNumber(product, line, 'COEF×INPUT'),
    };
  });
}
