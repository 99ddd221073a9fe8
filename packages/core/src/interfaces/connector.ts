/**
 * Core Connector Interface
 *
 * File connectors (CSV, Excel, JSON) implement this interface so that the
 * link table, the feature collection and the summaries are read and written
 * the same way.
 */

import type { ReadResult, WriteResult, Record } from '../types/index.js';

/** Configuration common to all connectors */
export interface ConnectorConfig {
  /** Unique identifier for this connector instance */
  id: string;
  /** Human-readable name */
  name: string;
  /** Connector type (csv, excel, json) */
  type: string;
  /** Whether this connector rejects write operations */
  readonly?: boolean;
}

/** Connection state */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

/**
 * Base interface all connectors must implement
 */
export interface IConnector<TConfig extends ConnectorConfig = ConnectorConfig> {
  /** Connector configuration */
  readonly config: TConfig;

  /** Current connection state */
  readonly state: ConnectionState;

  /**
   * Load the data source
   * @throws ConnectorError if the source cannot be read or parsed
   */
  connect(): Promise<void>;

  /**
   * Release loaded data
   */
  disconnect(): Promise<void>;

  /**
   * Read all records, in source order, with the source's column names
   */
  readRecords(): Promise<ReadResult>;

  /**
   * Replace the destination's content with `records`
   * @throws ConnectorError if connector is readonly or the write fails
   */
  writeRecords(records: Record[]): Promise<WriteResult>;
}
