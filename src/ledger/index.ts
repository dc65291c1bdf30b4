/**
 * Procurement Ledger - append-only JSON history of procurement cycles
 *
 * File shape: `{ "records": [...], "lastUpdated": "<ISO>" }`. Every append
 * rewrites the whole file through a temp file and a rename, then refreshes
 * the CSV report when one is configured. Records are frozen once stored.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { RECORD_STATUSES, type ProcurementRecord } from '../types';
import { createLogger } from '../utils/logger';
import { recordsToCsv } from './csv';

const logger = createLogger('ledger');

const recordSchema = z.object({
  id: z.string().min(1),
  timestamp: z.string().min(1),
  itemsRequired: z.array(z.string()),
  itemIds: z.array(z.string()),
  selectedVendorId: z.string().nullable(),
  selectedVendorName: z.string().nullable(),
  totalCost: z.number(),
  totalItems: z.number().int().min(0),
  savings: z.number(),
  quotesReceived: z.number().int().min(0),
  status: z.enum(RECORD_STATUSES),
  callId: z.string().nullable(),
  emailSent: z.boolean(),
  approvalRequired: z.boolean(),
  orderNumber: z.string().nullable(),
  notes: z.string(),
});

const ledgerFileSchema = z.object({
  records: z.array(z.unknown()),
  lastUpdated: z.string().optional(),
});

export class LedgerError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = 'LedgerError';
  }
}

export interface LedgerOptions {
  ledgerFile: string;
  /** CSV report refreshed after every append. */
  reportFile?: string;
  now?: () => Date;
}

export interface LedgerSummary {
  totalCycles: number;
  completed: number;
  totalSpend: number;
  totalSavings: number;
  lastUpdated: string | null;
}

export class ProcurementLedger {
  private records: ProcurementRecord[] | null = null;
  /** Entries exactly as read, unreadable ones included; appends go after these. */
  private entries: unknown[] = [];
  private lastUpdated: string | null = null;
  private readonly now: () => Date;

  constructor(private readonly options: LedgerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get path(): string {
    return this.options.ledgerFile;
  }

  /**
   * Read the ledger file. A missing file is an empty ledger; entries that
   * fail validation are left out of the returned records but stay in the
   * file.
   */
  load(): readonly ProcurementRecord[] {
    const filePath = this.options.ledgerFile;
    if (!existsSync(filePath)) {
      this.records = [];
      this.entries = [];
      this.lastUpdated = null;
      return this.records;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (err) {
      throw new LedgerError(
        `Failed to read ledger: ${err instanceof Error ? err.message : String(err)}`,
        filePath,
      );
    }

    const file = ledgerFileSchema.safeParse(raw);
    if (!file.success) {
      throw new LedgerError('Ledger file must be an object with a "records" array', filePath);
    }

    const records: ProcurementRecord[] = [];
    file.data.records.forEach((entry, index) => {
      const parsed = recordSchema.safeParse(entry);
      if (parsed.success) {
        records.push(Object.freeze(parsed.data));
      } else {
        logger.warn({ index, issues: parsed.error.issues.length }, 'Skipping invalid ledger record');
      }
    });

    this.records = records;
    this.entries = file.data.records;
    this.lastUpdated = file.data.lastUpdated ?? null;
    logger.debug({ filePath, count: records.length }, 'Ledger loaded');
    return records;
  }

  all(): readonly ProcurementRecord[] {
    return this.records ?? this.load();
  }

  /**
   * Append one record and persist. Returns the frozen stored copy.
   */
  append(record: ProcurementRecord): ProcurementRecord {
    const current = this.all();
    const stored = Object.freeze({
      ...record,
      itemsRequired: Object.freeze([...record.itemsRequired]),
      itemIds: Object.freeze([...record.itemIds]),
    });
    const entries = [...this.entries, stored];

    this.lastUpdated = this.now().toISOString();
    this.writeAtomic(
      this.options.ledgerFile,
      JSON.stringify({ records: entries, lastUpdated: this.lastUpdated }, null, 2),
    );
    this.entries = entries;
    this.records = [...current, stored];
    logger.info({ id: stored.id, status: stored.status }, 'Procurement record saved');

    if (this.options.reportFile) {
      this.exportCsv(this.options.reportFile);
    }
    return stored;
  }

  /**
   * Write the CSV report. Returns the path written.
   */
  exportCsv(filePath = this.options.reportFile): string {
    if (!filePath) {
      throw new LedgerError('No report file configured', this.options.ledgerFile);
    }
    this.writeAtomic(filePath, recordsToCsv(this.all()));
    logger.debug({ filePath }, 'CSV report exported');
    return filePath;
  }

  summary(): LedgerSummary {
    const records = this.all();
    const completed = records.filter((r) => r.status === 'Completed');
    return {
      totalCycles: records.length,
      completed: completed.length,
      totalSpend: completed.reduce((sum, r) => sum + r.totalCost, 0),
      totalSavings: completed.reduce((sum, r) => sum + r.savings, 0),
      lastUpdated: this.lastUpdated,
    };
  }

  private writeAtomic(filePath: string, content: string): void {
    mkdirSync(dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.${process.pid}.tmp`;
    writeFileSync(tempPath, content, 'utf-8');
    renameSync(tempPath, filePath);
  }
}
