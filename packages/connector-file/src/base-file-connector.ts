/**
 * Base class for file-based connectors
 * Handles common functionality: loading, caching, and writing back whole files
 */

import { readFile, writeFile, access, mkdir } from 'node:fs/promises';
import { constants } from 'node:fs';
import { dirname } from 'node:path';
import type {
  IConnector,
  ConnectorConfig,
  ConnectionState,
  ReadResult,
  WriteResult,
  Record,
} from '@gaugelink/core';
import { ConnectorError } from '@gaugelink/core';

export interface FileConnectorConfig extends ConnectorConfig {
  /** Path to the file */
  filePath: string;
  /** Where writeRecords writes to (default: filePath) */
  outputPath?: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
  /**
   * Do not read filePath on connect; the connector starts empty and is only
   * used to write. Default: false.
   */
  writeOnly?: boolean;
}

/** Records and column names parsed from a file */
export interface ParsedContent {
  records: Record[];
  columns: string[];
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Abstract base class for file connectors
 */
export abstract class BaseFileConnector<TConfig extends FileConnectorConfig>
  implements IConnector<TConfig>
{
  readonly config: TConfig;
  protected _state: ConnectionState = 'disconnected';
  protected _records: Record[] = [];
  protected _columns: string[] = [];

  constructor(config: TConfig) {
    this.config = config;
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';

    if (this.config.writeOnly) {
      this._records = [];
      this._columns = [];
      this._state = 'connected';
      return;
    }

    try {
      // Check file exists and is readable
      await access(this.config.filePath, constants.R_OK);

      const content = await readFile(
        this.config.filePath,
        this.config.encoding ?? 'utf-8'
      );

      const parsed = await this.parseContent(content);
      this._records = parsed.records;
      this._columns = parsed.columns;
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';

      if (error instanceof ConnectorError) {
        throw error;
      }

      const code = errnoCode(error);

      if (code === 'ENOENT') {
        throw new ConnectorError({
          code: 'NOT_FOUND',
          message: `File not found: ${this.config.filePath}`,
          connectorId: this.config.id,
          filePath: this.config.filePath,
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      }

      if (code === 'EACCES') {
        throw new ConnectorError({
          code: 'PERMISSION_DENIED',
          message: `Cannot read file: ${this.config.filePath}`,
          connectorId: this.config.id,
          filePath: this.config.filePath,
          suggestion: 'Check file permissions.',
        });
      }

      throw new ConnectorError({
        code: 'READ_FAILED',
        message: `Failed to read file: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        filePath: this.config.filePath,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async disconnect(): Promise<void> {
    this._records = [];
    this._columns = [];
    this._state = 'disconnected';
  }

  async readRecords(): Promise<ReadResult> {
    this.ensureConnected();

    return {
      records: [...this._records],
      columns: [...this._columns],
      totalCount: this._records.length,
    };
  }

  async writeRecords(records: Record[]): Promise<WriteResult> {
    this.ensureConnected();

    const destination = this.config.outputPath ?? this.config.filePath;

    if (this.config.readonly) {
      throw new ConnectorError({
        code: 'UNSUPPORTED_OPERATION',
        message: 'This connector is configured as read-only',
        connectorId: this.config.id,
        filePath: destination,
        suggestion: 'Create a new connector with readonly: false to enable writes.',
      });
    }

    try {
      this._records = [...records];

      const content = await this.serializeContent(this._records);
      await mkdir(dirname(destination), { recursive: true });
      await writeFile(destination, content, this.config.encoding ?? 'utf-8');

      return {
        success: records.length,
        failed: 0,
        destination,
      };
    } catch (error) {
      if (error instanceof ConnectorError) {
        throw error;
      }

      throw new ConnectorError({
        code: 'WRITE_FAILED',
        message: `Failed to write records: ${error instanceof Error ? error.message : String(error)}`,
        connectorId: this.config.id,
        filePath: destination,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  protected ensureConnected(): void {
    if (this._state !== 'connected') {
      throw new ConnectorError({
        code: 'NOT_CONNECTED',
        message: 'Connector is not connected',
        connectorId: this.config.id,
        filePath: this.config.filePath,
        suggestion: 'Call connect() before performing operations.',
      });
    }
  }

  /**
   * Parse file content into records (implemented by subclasses)
   */
  protected abstract parseContent(content: string | Buffer): Promise<ParsedContent>;

  /**
   * Serialize records back to file content (implemented by subclasses)
   */
  protected abstract serializeContent(records: Record[]): Promise<string | Buffer>;
}
