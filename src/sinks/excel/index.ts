import path from 'node:path';
import ExcelJS from 'exceljs';
import type { DataRecord } from '../../canon/record.js';
import { ensureDir } from '../../lib/fs.js';

/** Excel rejects sheet names longer than this. */
export const MAX_SHEET_NAME_LENGTH = 31;

export interface WorkbookSheet {
  name: string;
  columns: string[];
  rows: DataRecord[];
}

export interface WriteProjectionWorkbookInput {
  sheets: WorkbookSheet[];
  outputPath: string;
}

export function sheetNameFor(name: string, taken: ReadonlySet<string>): string {
  const cleaned = name.replace(/[\\/?*[\]:]/g, '_');
  let candidate = cleaned.slice(0, MAX_SHEET_NAME_LENGTH);
  let suffix = 2;
  while (taken.has(candidate.toLowerCase())) {
    const tail = `_${suffix}`;
    candidate = `${cleaned.slice(0, MAX_SHEET_NAME_LENGTH - tail.length)}${tail}`;
    suffix += 1;
  }
  return candidate;
}

export async function writeProjectionWorkbook(input: WriteProjectionWorkbookInput): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const taken = new Set<string>();

  for (const sheet of input.sheets) {
    const sheetName = sheetNameFor(sheet.name, taken);
    taken.add(sheetName.toLowerCase());
    const worksheet = workbook.addWorksheet(sheetName);

    worksheet.addRow(sheet.columns);
    const headerRow = worksheet.getRow(1);
    headerRow.font = { bold: true };
    headerRow.fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FFE0E0E0' }
    };

    for (const row of sheet.rows) {
      // Convert null to empty string for Excel
      worksheet.addRow(sheet.columns.map((column) => row[column] ?? ''));
    }

    sheet.columns.forEach((column, index) => {
      worksheet.getColumn(index + 1).width = Math.max(column.length + 2, 15);
    });
  }

  await ensureDir(path.dirname(input.outputPath));
  await workbook.xlsx.writeFile(input.outputPath);
}
