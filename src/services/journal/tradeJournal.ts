import type { JournalConfig } from '@models/configuration.types';
import type { TradeRecord } from '@models/trade.types';
import { error, info } from '@services/logger';
import { escapeCsvField, toErrorMessage } from '@utils/string/string.utils';
import { appendFileSync, existsSync, mkdirSync, statSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import type { TradeRecorder } from './tradeJournal.types';

export const CSV_HEADER = 'timestamp,symbol,side,quantity,entry price,take profit,stop loss,status\n';

export const toCsvLine = ({ timestamp, symbol, side, quantity, entryPrice, takeProfit, stopLoss, status }: TradeRecord) =>
  `${[new Date(timestamp).toISOString(), symbol, side, quantity, entryPrice, takeProfit, stopLoss, status]
    .map(escapeCsvField)
    .join(',')}\n`;

export class LogTradeJournal implements TradeRecorder {
  public async recordTrade({ symbol, side, quantity, entryPrice, takeProfit, stopLoss, status }: TradeRecord) {
    info(
      'journal',
      `${symbol} ${side} qty=${quantity} entry=${entryPrice} TP=${takeProfit} SL=${stopLoss} status=${status}`,
    );
  }
}

/** Appends one line per trade to a CSV file, writing the header when the file is new or empty */
export class CsvTradeJournal implements TradeRecorder {
  private isReady = false;

  constructor(private readonly filePath: string) {}

  public async recordTrade(record: TradeRecord) {
    try {
      this.prepareFile();
      appendFileSync(this.filePath, toCsvLine(record), 'utf8');
    } catch (err) {
      error('journal', `Failed to write trade of ${record.symbol} to ${this.filePath}: ${toErrorMessage(err)}`);
    }
  }

  private prepareFile() {
    if (this.isReady) return;
    mkdirSync(path.dirname(this.filePath), { recursive: true });
    if (!existsSync(this.filePath) || statSync(this.filePath).size === 0)
      writeFileSync(this.filePath, CSV_HEADER, 'utf8');
    this.isReady = true;
  }
}

export const createTradeJournal = (journalConfig: JournalConfig): TradeRecorder => {
  switch (journalConfig.type) {
    case 'log':
      return new LogTradeJournal();
    case 'csv':
      return new CsvTradeJournal(journalConfig.path);
  }
};
