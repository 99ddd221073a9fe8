/**
 * Excel Connector
 * Reads and writes Excel files (.xlsx), with optional per-row fills on write
 */

import ExcelJS from 'exceljs';
import type { Record } from '@gaugelink/core';
import { ConnectorError, extractFieldNames } from '@gaugelink/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
  type ParsedContent,
} from './base-file-connector.js';

/** Returns an ARGB fill colour (e.g. 'FF90EE90') for a written row, or undefined for none */
export type RowFill = (record: Record) => string | undefined;

export interface ExcelConnectorConfig extends FileConnectorConfig {
  type: 'excel';
  /** Sheet name or index (default: first sheet) */
  sheet?: string | number;
  /** Column order used on write (default: field names in first-seen order) */
  columns?: string[];
  /** Column widths used on write, by position (default: 15 for every column) */
  columnWidths?: number[];
  /** Solid fill applied to every cell of a written data row */
  rowFill?: RowFill;
}

const FORBIDDEN_RECORD_KEYS = new Set(['__proto__', 'prototype', 'constructor']);
const DEFAULT_COLUMN_WIDTH = 15;

export class ExcelConnector extends BaseFileConnector<ExcelConnectorConfig> {
  private _workbook: ExcelJS.Workbook | null = null;

  constructor(config: Omit<ExcelConnectorConfig, 'type'> & { type?: 'excel' }) {
    super({ ...config, type: 'excel' });
  }

  protected async parseContent(_content: string | Buffer): Promise<ParsedContent> {
    // ExcelJS needs to read from file directly for better handling
    this._workbook = new ExcelJS.Workbook();
    try {
      await this._workbook.xlsx.readFile(this.config.filePath);
    } catch (error) {
      throw new ConnectorError({
        code: 'PARSE_FAILED',
        message: `Invalid workbook: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        filePath: this.config.filePath,
        suggestion: 'Check that the file is an .xlsx workbook.',
        cause: error instanceof Error ? error : undefined,
      });
    }

    const sheet = this.getSheet();
    if (!sheet) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Sheet not found: ${this.config.sheet ?? 'first sheet'}`,
        connectorId: this.config.id,
        filePath: this.config.filePath,
        suggestion: 'Check that the sheet name/index is correct.',
      });
    }

    // Header row is the first row; data follows
    const headers: string[] = [];
    sheet.getRow(1).eachCell({ includeEmpty: false }, (cell, colNumber) => {
      headers[colNumber - 1] = String(this.getCellValue(cell) ?? `Column${colNumber}`);
    });

    for (const header of headers) {
      if (FORBIDDEN_RECORD_KEYS.has(header)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Unsafe Excel header name: ${header}`,
          connectorId: this.config.id,
          filePath: this.config.filePath,
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
    }

    const records: Record[] = [];

    sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber < 2) return;

      const record: Record = Object.create(null);
      let hasData = false;

      headers.forEach((header, headerIndex) => {
        if (!header) return;
        const value = this.getCellValue(row.getCell(headerIndex + 1));
        if (value !== null && value !== '') {
          hasData = true;
        }
        record[header] = value;
      });

      // Only add row if it has some data
      if (hasData) {
        records.push(record);
      }
    });

    return { records, columns: headers.filter((h) => h !== undefined) };
  }

  protected async serializeContent(records: Record[]): Promise<Buffer> {
    if (!this._workbook) {
      this._workbook = new ExcelJS.Workbook();
    }

    const sheet =
      this.getSheet() ??
      this._workbook.addWorksheet(
        typeof this.config.sheet === 'string' ? this.config.sheet : 'Sheet1'
      );

    // Clear existing data
    sheet.eachRow((row) => {
      row.eachCell((cell) => {
        cell.value = null;
      });
    });

    const headers = this.config.columns ?? extractFieldNames(records);

    const headerRow = sheet.getRow(1);
    headers.forEach((header, index) => {
      headerRow.getCell(index + 1).value = header;
    });
    headerRow.font = { bold: true };

    records.forEach((record, rowIndex) => {
      const row = sheet.getRow(rowIndex + 2);
      const argb = this.config.rowFill?.(record);

      headers.forEach((header, colIndex) => {
        const cell = row.getCell(colIndex + 1);
        const value = record[header];
        cell.value = value === undefined ? null : (value as ExcelJS.CellValue);
        if (argb) {
          cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb } };
        }
      });
    });

    headers.forEach((_, index) => {
      sheet.getColumn(index + 1).width =
        this.config.columnWidths?.[index] ?? DEFAULT_COLUMN_WIDTH;
    });

    const buffer = await this._workbook.xlsx.writeBuffer();
    return Buffer.from(buffer);
  }

  private getSheet(): ExcelJS.Worksheet | undefined {
    if (!this._workbook) return undefined;

    if (this.config.sheet !== undefined) {
      return this._workbook.getWorksheet(this.config.sheet);
    }

    // Default: first sheet
    return this._workbook.worksheets[0];
  }

  private getCellValue(cell: ExcelJS.Cell): unknown {
    const value = cell.value;

    if (value === null || value === undefined) {
      return null;
    }

    // Handle formula results
    if (typeof value === 'object' && 'result' in value) {
      return (value as ExcelJS.CellFormulaValue).result;
    }

    // Handle rich text
    if (typeof value === 'object' && 'richText' in value) {
      return (value as ExcelJS.CellRichTextValue).richText
        .map((rt) => rt.text)
        .join('');
    }

    // Handle hyperlinks
    if (typeof value === 'object' && 'hyperlink' in value) {
      return (value as ExcelJS.CellHyperlinkValue).text;
    }

    // Handle dates
    if (value instanceof Date) {
      return value.toISOString();
    }

    return value;
  }
}

/**
 * Factory function to create an Excel connector
 */
export function createExcelConnector(
  config: Omit<ExcelConnectorConfig, 'type'>
): ExcelConnector {
  return new ExcelConnector(config);
}
