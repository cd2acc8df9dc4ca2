import fs from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import PDFDocument from 'pdfkit';
import type { QuoteRecord, RenderData, RenderValue } from '../domains/pricing';

export type QuoteDocumentPaths = {
  markdownPath: string;
  textPath: string;
  pdfPath: string;
};

const LINES_SECTION = /{{#lines}}([\s\S]*?){{\/lines}}/g;

function replaceVars(text: string, context: Record<string, RenderValue>): string {
  let output = text;
  for (const [key, value] of Object.entries(context)) {
    output = output.split(`{{${key}}}`).join(String(value));
  }
  return output;
}

/**
 * `{{name}}` substitution plus one repeated block, `{{#lines}}...{{/lines}}`,
 * rendered once per line with the line's fields layered over the outer ones.
 * Unknown placeholders are left as they are.
 */
export function renderTemplate(template: string, data: RenderData): string {
  const expanded = template.replace(LINES_SECTION, (_match, block: string) =>
    data.lines.map((line) => replaceVars(block, { ...data.fields, ...line })).join('')
  );
  return replaceVars(expanded, data.fields);
}

const TABLE_SEPARATOR_CELL = /^-*$/;

/**
 * Plain-text rendering of the quote markdown: table rows become " | "-joined
 * cells, separator rows are dropped, bold markers and heading hashes removed.
 */
export function markdownToText(markdown: string): string {
  const lines: string[] = [];
  for (const raw of markdown.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.startsWith('|') && line.endsWith('|')) {
      const cells = line
        .replace(/^\|/, '')
        .replace(/\|$/, '')
        .split('|')
        .map((cell) => cell.trim());
      if (cells.every((cell) => TABLE_SEPARATOR_CELL.test(cell))) {
        continue;
      }
      lines.push(cells.join(' | '));
      continue;
    }
    lines.push(line.split('**').join('').replace(/^#+\s*/, ''));
  }
  return `${lines.join('\n').trim()}\n`;
}

function field(record: QuoteRecord, key: string): string {
  const value = record.renderData.fields[key];
  return value === undefined ? '' : String(value);
}

export function writeQuotePdf(filePath: string, record: QuoteRecord): Promise<string> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ margin: 50, size: 'A4' });
    const stream = fs.createWriteStream(filePath);
    stream.on('finish', () => resolve(filePath));
    stream.on('error', reject);
    doc.on('error', reject);
    doc.pipe(stream);

    const currency = field(record, 'currency');

    doc.font('Helvetica-Bold').fontSize(18).text(`${field(record, 'company_name')} - Quotation`);
    doc.moveDown(0.5);
    doc.font('Helvetica').fontSize(11);
    doc.text(`Quote ID: ${record.quoteId}`);
    doc.text(`Date: ${record.quoteDate}`);
    doc.text(`Valid Until: ${record.validUntil}`);
    doc.text(`Customer: ${field(record, 'customer_name')}`);
    doc.text(`Project: ${field(record, 'job_type')} x ${field(record, 'quantity')}`);
    doc.text(`Delivery / Due: ${field(record, 'due_date')}`);
    doc.moveDown();

    doc.font('Helvetica-Bold').fontSize(12).text('Bill of Materials & Labor');
    doc.moveDown(0.3);

    const colX = { name: 50, qty: 250, unit: 320, unitCost: 380, lineCost: 480 };
    doc.fontSize(10);
    let y = doc.y;
    doc.text('Item', colX.name, y);
    doc.text('Qty', colX.qty, y);
    doc.text('Unit', colX.unit, y);
    doc.text(`Unit Cost (${currency})`, colX.unitCost, y);
    doc.text('Line Cost', colX.lineCost, y);
    doc.moveDown(0.3);
    doc.moveTo(50, doc.y).lineTo(545, doc.y).stroke();
    doc.moveDown(0.3);

    doc.font('Helvetica');
    for (const line of record.renderData.lines) {
      y = doc.y;
      doc.text(String(line.name), colX.name, y, { width: 190 });
      doc.text(String(line.qty), colX.qty, y);
      doc.text(String(line.unit), colX.unit, y);
      doc.text(String(line.unit_cost), colX.unitCost, y);
      doc.text(String(line.line_cost), colX.lineCost, y);
      doc.moveDown(0.2);
    }

    doc.font('Helvetica-Bold');
    y = doc.y;
    doc.text(`Labor (@ ${field(record, 'labor_rate')}/h)`, colX.name, y);
    doc.text(field(record, 'labor_hours'), colX.qty, y);
    doc.text('h', colX.unit, y);
    doc.text(field(record, 'labor_cost'), colX.lineCost, y);
    doc.moveDown();

    doc.font('Helvetica').fontSize(11);
    const totals: Array<[string, string]> = [
      ['Materials Subtotal', field(record, 'materials_subtotal')],
      ['Labor Subtotal', field(record, 'labor_cost')],
      ['Subtotal (pre-markup)', field(record, 'subtotal')],
      [`Markup (${field(record, 'markup_pct')})`, field(record, 'markup_value')],
      ['Price before VAT', field(record, 'price_before_vat')],
      [`VAT (${field(record, 'vat_pct')})`, field(record, 'vat_value')],
      ['Total', field(record, 'total')]
    ];
    for (const [label, value] of totals) {
      doc.text(`${label}: ${value} ${currency}`, 50);
    }
    doc.moveDown();

    doc.font('Helvetica-Bold').text('Notes:', 50);
    doc.font('Helvetica').text(field(record, 'notes'), 50, doc.y, { width: 495 });
    doc.moveDown();
    doc.font('Helvetica-Oblique').fontSize(10).text(`Thank you for your business! - ${field(record, 'sender_name')}`, 50);

    doc.end();
  });
}

export async function writeQuoteDocuments(
  outputDir: string,
  record: QuoteRecord,
  markdown: string
): Promise<QuoteDocumentPaths> {
  await fsp.mkdir(outputDir, { recursive: true });
  const stem = path.join(outputDir, `quote_${record.quoteId}`);
  const markdownPath = `${stem}.md`;
  const textPath = `${stem}.txt`;
  await fsp.writeFile(markdownPath, markdown, 'utf-8');
  await fsp.writeFile(textPath, markdownToText(markdown), 'utf-8');
  const pdfPath = await writeQuotePdf(`${stem}.pdf`, record);
  return { markdownPath, textPath, pdfPath };
}
