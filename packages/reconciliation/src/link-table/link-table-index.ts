/**
 * Link Table Index
 *
 * Builds the read-only row index the matching tiers work against.
 */

import type { IConnector, Record as DataRecord } from '@gaugelink/core';
import { ConnectorError } from '@gaugelink/core';
import type { FileConnectorConfig } from '@gaugelink/connector-file';
import type { LinkRow, LinkTableIndex } from '../types/index.js';
import { MalformedInputError } from '../errors/index.js';

/** Columns the link table header must contain */
export const LINK_TABLE_COLUMNS = ['name', 'id', 'link'] as const;

type LinkTableColumn = (typeof LINK_TABLE_COLUMNS)[number];

/** Connector errors that mean the file content is wrong, not the file access */
const MALFORMED_CODES = new Set(['PARSE_FAILED', 'SCHEMA_MISMATCH']);

function cellText(
  record: DataRecord,
  column: LinkTableColumn,
  rowNumber: number,
  source: string
): string {
  const value = record[column];

  if (value === null || value === undefined) {
    return '';
  }

  if (typeof value === 'string') {
    return value.trim();
  }

  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }

  throw new MalformedInputError({
    source,
    message: `Row ${rowNumber}: column '${column}' does not hold a text value`,
    suggestion: 'Link table cells must be plain text or numbers.',
    context: { rowNumber, column },
  });
}

/**
 * Build the index from already parsed rows.
 *
 * @param records - Data rows in file order
 * @param columns - Header row
 * @param source - File path, used in error messages
 * @throws MalformedInputError if the header is missing or lacks a required column
 */
export function buildLinkTableIndex(
  records: readonly DataRecord[],
  columns: readonly string[],
  source: string
): LinkTableIndex {
  if (columns.length === 0) {
    throw new MalformedInputError({
      source,
      message: 'Link table has no header row',
      suggestion: `Add a header row with the columns: ${LINK_TABLE_COLUMNS.join(', ')}.`,
    });
  }

  const missing = LINK_TABLE_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new MalformedInputError({
      source,
      message: `Link table is missing required column(s): ${missing.join(', ')}`,
      suggestion: `The header row must contain: ${LINK_TABLE_COLUMNS.join(', ')}.`,
      context: { columns: [...columns], missing },
    });
  }

  const rows: LinkRow[] = [];
  const idToFirstIndex = new Map<string, number>();
  const duplicateIds = new Set<string>();

  records.forEach((record, rowIndex) => {
    // Data rows are numbered from 1, below the header
    const rowNumber = rowIndex + 1;
    const row: LinkRow = {
      name: cellText(record, 'name', rowNumber, source),
      id: cellText(record, 'id', rowNumber, source),
      link: cellText(record, 'link', rowNumber, source),
    };
    rows.push(row);

    if (row.id === '') return;

    if (idToFirstIndex.has(row.id)) {
      duplicateIds.add(row.id);
    } else {
      idToFirstIndex.set(row.id, rowIndex);
    }
  });

  return { source, rows, idToFirstIndex, duplicateIds };
}

/**
 * Read the link table through a file connector (CSV or Excel) and index it.
 * Loading twice from the same file gives equal indexes.
 *
 * @throws MalformedInputError if the file cannot be parsed or lacks a required column
 * @throws ConnectorError if the file cannot be found or read
 */
export async function loadLinkTable(
  connector: IConnector<FileConnectorConfig>
): Promise<LinkTableIndex> {
  const source = connector.config.filePath;

  try {
    if (connector.state !== 'connected') {
      await connector.connect();
    }
    const { records, columns } = await connector.readRecords();
    return buildLinkTableIndex(records, columns, source);
  } catch (error) {
    if (error instanceof ConnectorError && MALFORMED_CODES.has(error.code)) {
      throw new MalformedInputError({
        source,
        message: error.message,
        suggestion: error.suggestion,
        cause: error,
      });
    }
    throw error;
  }
}
