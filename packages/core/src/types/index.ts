export type {
  Record,
  ReadResult,
  WriteResult,
} from './record.js';
