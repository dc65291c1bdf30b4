/**
 * CSV report mirror of the procurement ledger
 */

import type { ProcurementRecord } from '../types';
import { generateCSV, type CSVValue } from '../export/formats';

export const REPORT_HEADERS = [
  'Record ID',
  'Timestamp',
  'Items Required',
  'Selected Vendor',
  'Total Cost',
  'Total Items',
  'Savings',
  'Quotes Received',
  'Status',
  'Call ID',
  'Email Sent',
  'Approval Required',
  'Order Number',
  'Notes',
];

export function recordToRow(record: ProcurementRecord): CSVValue[] {
  return [
    record.id,
    record.timestamp,
    record.itemsRequired.join('; '),
    record.selectedVendorName ?? '',
    record.totalCost.toFixed(2),
    record.totalItems,
    record.savings.toFixed(2),
    record.quotesReceived,
    record.status,
    record.callId ?? '',
    record.emailSent ? 'Yes' : 'No',
    record.approvalRequired ? 'Yes' : 'No',
    record.orderNumber ?? '',
    record.notes,
  ];
}

export function recordsToCsv(records: readonly ProcurementRecord[]): string {
  return generateCSV(REPORT_HEADERS, records.map(recordToRow)) + '\n';
}
