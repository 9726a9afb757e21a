import { Writable } from 'node:stream';
import bunyan from 'bunyan';
import type { Logger } from '../../src/utils/logger.js';

export interface LogRecord {
  level: number;
  msg: string;
  service?: string;
  [field: string]: unknown;
}

/**
 * Logger that keeps every record in memory instead of writing to stdout
 */
export function createTestLogger(): { log: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const stream = new Writable({
    objectMode: true,
    write(record: LogRecord, _encoding, callback) {
      records.push(record);
      callback();
    },
  });

  const log = bunyan.createLogger({
    name: 'test',
    streams: [{ type: 'raw', level: 'trace', stream }],
  });

  return { log, records };
}
