import fs from 'fs';
import path from 'path';
import type { PerformanceSnapshot, TradeRecord } from '../strategies/types';
import type { Logger } from '../utils/logger';

export const CSV_HEADERS = ['timestamp', 'symbol', 'side', 'price', 'qty', 'order_id', 'status', 'pnl', 'fee', 'note'];

export function journalPathFor(dir: string, date: Date) {
  return path.join(dir, `trades_${date.toISOString().slice(0, 10)}.csv`);
}

function csvValue(value: string) {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsvRow(record: TradeRecord) {
  return [
    record.timestamp,
    record.symbol,
    record.side,
    String(record.price),
    String(record.qty),
    record.orderId,
    record.status,
    String(record.pnl),
    String(record.fee),
    record.note,
  ]
    .map(csvValue)
    .join(',');
}

/**
 * Append-only record of fills. A null path keeps the log lines and skips
 * the file.
 */
export class TradeJournal {
  private readonly csvPath: string | null;
  private readonly logger: Logger;
  private headerEnsured = false;

  constructor(csvPath: string | null, logger: Logger) {
    this.csvPath = csvPath;
    this.logger = logger;
  }

  private ensureCsvHeader(csvPath: string) {
    if (this.headerEnsured) return;
    fs.mkdirSync(path.dirname(csvPath), { recursive: true });
    if (!fs.existsSync(csvPath) || fs.statSync(csvPath).size === 0) {
      fs.writeFileSync(csvPath, `${CSV_HEADERS.join(',')}\n`);
    }
    this.headerEnsured = true;
  }

  record(record: TradeRecord) {
    this.logger.info('trade_recorded', { event: 'trade_recorded', ...record });
    if (!this.csvPath) return;
    this.ensureCsvHeader(this.csvPath);
    fs.appendFileSync(this.csvPath, `${toCsvRow(record)}\n`);
  }

  performance(snapshot: PerformanceSnapshot) {
    this.logger.info('performance_snapshot', { event: 'performance_snapshot', ...snapshot });
  }
}
