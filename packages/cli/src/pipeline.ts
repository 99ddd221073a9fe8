/**
 * Reconciliation run: load both inputs, match, then write every output.
 * Nothing is written unless both inputs loaded.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  createCsvConnector,
  createExcelConnector,
  createJsonConnector,
  type CsvConnector,
  type ExcelConnector,
} from '@gaugelink/connector-file';
import {
  ReconciliationEngine,
  SUMMARY_COLUMNS,
  SUMMARY_COLUMN_WIDTHS,
  buildSummaryRows,
  formatMatchReport,
  loadFeatureCollection,
  loadLinkTable,
  summaryRowFill,
  type ReconciliationResult,
} from '@gaugelink/reconciliation';
import type { RunOptions } from './config.js';
import type { Logger } from './logger.js';

export interface RunOutcome {
  result: ReconciliationResult;
  /** Files written, in order */
  written: string[];
}

function createLinkTableConnector(options: RunOptions): CsvConnector | ExcelConnector {
  const { linkTable } = options;

  if (linkTable.type === 'excel') {
    return createExcelConnector({
      id: 'link-table',
      name: 'Link table',
      readonly: true,
      filePath: linkTable.filePath,
      sheet: linkTable.sheet,
    });
  }

  return createCsvConnector({
    id: 'link-table',
    name: 'Link table',
    readonly: true,
    filePath: linkTable.filePath,
    encoding: linkTable.encoding,
    delimiter: linkTable.delimiter,
  });
}

export async function runReconciliation(
  options: RunOptions,
  logger: Logger,
  now: () => Date = () => new Date()
): Promise<RunOutcome> {
  const linkConnector = createLinkTableConnector(options);
  const featureConnector = createJsonConnector({
    id: 'features',
    name: 'Features',
    filePath: options.features.filePath,
    outputPath: options.output.featuresPath,
    encoding: options.features.encoding,
    recordsPath: 'features',
  });

  try {
    const index = await loadLinkTable(linkConnector);
    logger.info('Link table loaded', {
      file: index.source,
      rows: index.rows.length,
      uniqueIds: index.idToFirstIndex.size,
      duplicateIds: index.duplicateIds.size,
    });

    const collection = await loadFeatureCollection(featureConnector);
    logger.info('Features loaded', {
      file: options.features.filePath,
      features: collection.features.length,
    });

    const engine = new ReconciliationEngine({ minScore: options.minFuzzyScore });
    const result = engine.reconcile(collection, index);
    const { summary } = result;
    logger.info('Reconciliation complete', {
      exactId: summary.exactIdCount,
      partialId: summary.partialIdCount,
      fuzzyName: summary.fuzzyNameCount,
      unmatched: summary.unmatchedCount,
      skipped: summary.skippedCount,
    });
    for (const record of result.records) {
      if (record.tier === 'unmatched') continue;
      logger.debug('Feature matched', {
        feature: record.featureIndex,
        tier: record.tier,
        rowId: record.row.id,
        link: record.row.link,
        score: record.score,
      });
    }
    for (const warning of result.warnings) {
      logger.debug('Feature property missing', { ...warning });
    }

    const written: string[] = [];

    await featureConnector.writeRecords(result.collection.features);
    written.push(options.output.featuresPath);

    const report = formatMatchReport(result, {
      generatedAt: now(),
      linkTableSource: index.source,
      featureSource: options.features.filePath,
    });
    await mkdir(dirname(options.output.reportPath), { recursive: true });
    await writeFile(options.output.reportPath, report, 'utf-8');
    written.push(options.output.reportPath);

    const rows = buildSummaryRows(result.records);

    const summaryConnector = createExcelConnector({
      id: 'summary',
      name: 'Summary',
      filePath: options.output.summaryPath,
      writeOnly: true,
      sheet: 'Summary',
      columns: SUMMARY_COLUMNS,
      columnWidths: SUMMARY_COLUMN_WIDTHS,
      rowFill: summaryRowFill,
    });
    await summaryConnector.connect();
    await summaryConnector.writeRecords(rows);
    written.push(options.output.summaryPath);

    if (options.output.summaryCsvPath) {
      const csvConnector = createCsvConnector({
        id: 'summary-csv',
        name: 'Summary (CSV)',
        filePath: options.output.summaryCsvPath,
        writeOnly: true,
        columns: SUMMARY_COLUMNS,
      });
      await csvConnector.connect();
      await csvConnector.writeRecords(rows);
      written.push(options.output.summaryCsvPath);
    }

    for (const file of written) {
      logger.info('Output written', { file });
    }

    return { result, written };
  } finally {
    await linkConnector.disconnect();
    await featureConnector.disconnect();
  }
}
