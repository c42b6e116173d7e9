/**
 * INPUT: AffordabilityVerdict
 * OUTPUT: PDF 評估報告（三項判定 + z / p / thresholdRM + 計算明細表）
 * POS: 服務層，使用 pdf-lib 產生可下載的評估報告（不寫入磁碟）
 */

import { PDFDocument, PDFFont, PDFPage, rgb, StandardFonts } from 'pdf-lib';
import { AffordabilityVerdict } from '../models/affordability';

export const VERDICT_REPORT_FILENAME = 'affordability_report.pdf';

/** A4 */
const PAGE_WIDTH = 595.28;
const PAGE_HEIGHT = 841.89;
const MARGIN = 48;
const ROW_HEIGHT = 13;

const GREEN = rgb(0.02, 0.37, 0.27);
const RED = rgb(0.5, 0.11, 0.11);
const BLACK = rgb(0, 0, 0);
const MUTED = rgb(0.4, 0.45, 0.55);

/** Helvetica 僅支援 WinAnsi，超出範圍的字元以 ? 代替 */
function toWinAnsi(text: string): string {
  return text.replace(/[^\x20-\x7E\u00A0-\u00FF\u2013\u2014]/g, '?');
}

function truncate(text: string, font: PDFFont, size: number, maxWidth: number): string {
  if (font.widthOfTextAtSize(text, size) <= maxWidth) return text;
  let out = text;
  while (out.length > 1 && font.widthOfTextAtSize(`${out}...`, size) > maxWidth) {
    out = out.slice(0, -1);
  }
  return `${out}...`;
}

/**
 * 產生評估報告 PDF
 * @returns PDF 位元組
 */
export async function generateVerdictReportPdf(verdict: AffordabilityVerdict): Promise<Uint8Array> {
  const pdfDoc = await PDFDocument.create();
  pdfDoc.setTitle('Rental Affordability Check');
  const font = await pdfDoc.embedFont(StandardFonts.Helvetica);
  const bold = await pdfDoc.embedFont(StandardFonts.HelveticaBold);

  let page: PDFPage = pdfDoc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  let y = PAGE_HEIGHT - MARGIN;

  function drawText(text: string, x: number, size = 10, f: PDFFont = font, color = BLACK): void {
    page.drawText(toWinAnsi(text), { x, y, size, font: f, color });
  }

  function nextLine(height = ROW_HEIGHT): void {
    y -= height;
    if (y < MARGIN) {
      page = pdfDoc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
      y = PAGE_HEIGHT - MARGIN;
    }
  }

  // ── 標題 ──
  drawText('Rental Affordability Check', MARGIN, 18, bold);
  nextLine(18);
  drawText(`Model profile: ${verdict.schemaId} / ${verdict.coefficientTableId}`, MARGIN, 9, font, MUTED);
  nextLine(24);

  // ── 判定結果 ──
  const conditions: Array<[string, boolean, string]> = [
    [`Condition A (p >= ${verdict.probabilityThreshold})`, verdict.conditionA, verdict.labels.conditionA],
    [`Condition B (Rent <= ${verdict.rentRatio.toFixed(2)} x Income)`, verdict.conditionB, verdict.labels.conditionB],
    ['Overall', verdict.overall, verdict.labels.overall],
  ];
  for (const [label, pass, text] of conditions) {
    drawText(label, MARGIN, 11, bold);
    drawText(text, MARGIN + 260, 11, bold, pass ? GREEN : RED);
    nextLine(16);
  }
  nextLine(6);

  drawText(`SUM(COEF x INPUT) (z): ${verdict.z.toFixed(6)}`, MARGIN);
  nextLine();
  drawText(`Probability p = 1/(1+exp(-z)): ${verdict.p.toFixed(9)}`, MARGIN);
  nextLine();
  drawText(
    `Income RM ${verdict.income.toFixed(2)}, Rent RM ${verdict.rent.toFixed(2)}, ` +
      `${verdict.rentRatio.toFixed(2)} x Income = RM ${verdict.thresholdRM.toFixed(2)}`,
    MARGIN,
  );
  nextLine(24);

  // ── 計算明細表 ──
  const cols = { variable: MARGIN, coef: MARGIN + 300, input: MARGIN + 370, product: MARGIN + 430 };
  const header = (): void => {
    drawText('Variable', cols.variable, 9, bold);
    drawText('COEF', cols.coef, 9, bold);
    drawText('INPUT', cols.input, 9, bold);
    drawText('COEF x INPUT', cols.product, 9, bold);
    nextLine();
  };
  header();
  for (const row of verdict.breakdown) {
    const pageBefore = page;
    drawText(truncate(toWinAnsi(row.variable), font, 8, 290), cols.variable, 8);
    drawText(String(row.coefficient), cols.coef, 8);
    drawText(String(row.input), cols.input, 8);
    drawText(row.product.toFixed(6), cols.product, 8);
    nextLine(11);
    if (page !== pageBefore) header();
  }
  nextLine(6);
  drawText('z is exactly the sum of the COEF x INPUT column.', MARGIN, 8, font, MUTED);

  return pdfDoc.save();
}
