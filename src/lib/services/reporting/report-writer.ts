import fs from 'fs/promises';
import path from 'path';
import ExcelJS from 'exceljs';
import {
  FAILURE_OUTCOMES,
  type CaseResult,
  type ReportFormat,
  type RunSummary,
  type TestCase,
  type WrittenReport,
} from '@/lib/core/types';

export const REPORT_PREFIX = 'validation_report_';

export function reportFileName(runId: string, format: ReportFormat): string {
  return `${REPORT_PREFIX}${runId}.${format}`;
}

/** One flat row per case, shared by the CSV and the XLSX Results sheet */
export interface ResultRow {
  testCaseId: string;
  category: string;
  queryText: string;
  expectedDocumentId: string;
  outcome: string;
  searchMode: string;
  collectionName: string;
  observedRank: number | string;
  observedScore: number | string;
  matchedDocumentId: string;
  durationMs: number;
  errorDetail: string;
}

export const RESULT_COLUMNS: { header: string; key: keyof ResultRow; width: number }[] = [
  { header: 'testCaseId', key: 'testCaseId', width: 20 },
  { header: 'category', key: 'category', width: 18 },
  { header: 'queryText', key: 'queryText', width: 50 },
  { header: 'expectedDocumentId', key: 'expectedDocumentId', width: 24 },
  { header: 'outcome', key: 'outcome', width: 24 },
  { header: 'searchMode', key: 'searchMode', width: 12 },
  { header: 'collectionName', key: 'collectionName', width: 20 },
  { header: 'observedRank', key: 'observedRank', width: 14 },
  { header: 'observedScore', key: 'observedScore', width: 14 },
  { header: 'matchedDocumentId', key: 'matchedDocumentId', width: 24 },
  { header: 'durationMs', key: 'durationMs', width: 12 },
  { header: 'errorDetail', key: 'errorDetail', width: 60 },
];

/**
 * Flatten results for tabular formats. Absent values become empty cells.
 */
export function toResultRows(results: readonly CaseResult[], testCases: readonly TestCase[]): ResultRow[] {
  const byId = new Map(testCases.map((c) => [c.id, c]));

  return results.map((r) => {
    const testCase = byId.get(r.testCaseId);
    return {
      testCaseId: r.testCaseId,
      category: r.category ?? '',
      queryText: testCase?.queryText ?? '',
      expectedDocumentId: testCase?.expectedDocumentId ?? '',
      outcome: r.outcome,
      searchMode: r.searchMode,
      collectionName: r.collectionName,
      observedRank: r.observedRank ?? '',
      observedScore: r.observedScore ?? '',
      matchedDocumentId: r.matchedDocumentId ?? '',
      durationMs: r.durationMs,
      errorDetail: r.errorDetail ?? '',
    };
  });
}

/**
 * Writes one report file per requested format into the report directory,
 * named after the run id.
 */
export class ReportWriter {
  constructor(private reportDir: string) {}

  async write(
    summary: RunSummary,
    testCases: readonly TestCase[],
    formats: readonly ReportFormat[]
  ): Promise<WrittenReport[]> {
    await fs.mkdir(this.reportDir, { recursive: true });

    const written: WrittenReport[] = [];
    for (const format of formats) {
      const filePath = path.join(this.reportDir, reportFileName(summary.runId, format));

      if (format === 'json') {
        await fs.writeFile(filePath, JSON.stringify(summary, null, 2), 'utf-8');
      } else if (format === 'csv') {
        // The CSV writer exports the first worksheet only
        await this.buildWorkbook(summary, testCases, false).csv.writeFile(filePath);
      } else {
        await this.buildWorkbook(summary, testCases, true).xlsx.writeFile(filePath);
      }

      written.push({ format, path: filePath });
    }

    return written;
  }

  private buildWorkbook(summary: RunSummary, testCases: readonly TestCase[], withSummary: boolean): ExcelJS.Workbook {
    const workbook = new ExcelJS.Workbook();
    workbook.created = new Date(summary.startedAt);

    if (withSummary) {
      this.addSummarySheet(workbook, summary);
    }

    const sheet = workbook.addWorksheet('Results');
    sheet.columns = RESULT_COLUMNS;
    styleHeader(sheet.getRow(1));

    for (const row of toResultRows(summary.results, testCases)) {
      sheet.addRow(row);
    }

    return workbook;
  }

  private addSummarySheet(workbook: ExcelJS.Workbook, summary: RunSummary): void {
    const sheet = workbook.addWorksheet('Summary');
    sheet.columns = [
      { header: 'Field', key: 'field', width: 28 },
      { header: 'Value', key: 'value', width: 32 },
    ];
    styleHeader(sheet.getRow(1));

    const rows: [string, string | number | boolean][] = [
      ['runId', summary.runId],
      ['status', summary.status],
      ['startedAt', summary.startedAt],
      ['finishedAt', summary.finishedAt],
      ['durationMs', summary.durationMs],
      ['timedOut', summary.timedOut],
      ['totalCases', summary.totalCases],
      ['passCount', summary.passCount],
      ['passRate', summary.passRate],
      ...FAILURE_OUTCOMES.map((o): [string, number] => [o, summary.failCounts[o]]),
    ];
    for (const [field, value] of rows) {
      sheet.addRow({ field, value });
    }

    sheet.addRow({});
    const categoryHeader = sheet.addRow(['category', 'total', 'passed', 'passRate']);
    styleHeader(categoryHeader);
    for (const [category, stats] of Object.entries(summary.perCategoryStats)) {
      sheet.addRow([category, stats.total, stats.passed, stats.passRate]);
    }
  }
}

function styleHeader(row: ExcelJS.Row): void {
  row.eachCell((cell) => {
    cell.font = { bold: true };
    cell.fill = {
      type: 'pattern',
      pattern: 'solid',
      fgColor: { argb: 'FFE3F2FD' },
    };
    cell.border = {
      top: { style: 'thin' },
      bottom: { style: 'thin' },
    };
  });
}
