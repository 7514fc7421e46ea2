/**
 * Report Export
 * Renders report rows as labelled CSV columns
 */

import fs from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import {
  MailboxClassification,
  ReportResult,
  ReportRow,
  UserReportRow,
} from '../types';
import { PLACEHOLDER, REPORT } from '../utils/constants';
import { logger } from '../utils/logger';

export const REPORT_COLUMNS = [
  'Display Name',
  'User Principal Name',
  'Email',
  'Identity Type',
  'Employee Type',
  'User Type',
  'Country',
  'Account Status',
  'Created Date',
  'License Status',
  'Target Licenses',
  'All Licenses',
  'Mailbox Type',
  'Last Activity',
  'Activity Source',
  'Days Since Activity',
  'On-Prem Last Logon',
] as const;

export type ReportColumn = (typeof REPORT_COLUMNS)[number];

const MAILBOX_LABELS: Record<MailboxClassification, string> = {
  SharedMailbox: 'Shared Mailbox',
  RoomMailbox: 'Room Mailbox',
  EquipmentMailbox: 'Equipment Mailbox',
  DiscoveryMailbox: 'Discovery Mailbox',
  UserMailbox: 'User Mailbox',
  None: 'No Mailbox',
};

export function formatDate(date: Date | null): string {
  return date ? date.toISOString().slice(0, 10) : PLACEHOLDER.UNKNOWN;
}

export function formatDateTime(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

export function accountStatusLabel(enabled: boolean): string {
  return enabled ? 'Enabled' : 'Disabled';
}

export function licenseStatusLabel(row: ReportRow): string {
  if (row.kind === 'servicePrincipal') return PLACEHOLDER.NOT_APPLICABLE;
  return row.hasTargetLicense ? 'E5 Licensed' : 'No E5';
}

export function mailboxLabel(row: ReportRow): string {
  if (row.kind === 'servicePrincipal') return PLACEHOLDER.NOT_APPLICABLE;
  return MAILBOX_LABELS[row.mailbox];
}

export function daysSinceLabel(row: UserReportRow): string {
  const { source, daysSince } = row.activity;
  if (source === 'None' || daysSince === null) return PLACEHOLDER.NOT_AVAILABLE;
  return daysSince.toFixed(source === 'Cloud' ? 1 : 0);
}

function onPremLabel(row: UserReportRow): string {
  if (row.onPremLastLogon === undefined) return PLACEHOLDER.NOT_APPLICABLE;
  return row.onPremLastLogon ? formatDateTime(row.onPremLastLogon) : PLACEHOLDER.NEVER;
}

/**
 * Render one row as column label -> cell text.
 */
export function renderRow(row: ReportRow): Record<ReportColumn, string> {
  if (row.kind === 'servicePrincipal') {
    const na = PLACEHOLDER.NOT_APPLICABLE;
    return {
      'Display Name': row.displayName,
      'User Principal Name': row.appId,
      'Email': na,
      'Identity Type': 'Service Principal',
      'Employee Type': na,
      'User Type': na,
      'Country': na,
      'Account Status': accountStatusLabel(row.accountEnabled),
      'Created Date': formatDate(row.createdAt),
      'License Status': na,
      'Target Licenses': na,
      'All Licenses': na,
      'Mailbox Type': na,
      'Last Activity': na,
      'Activity Source': na,
      'Days Since Activity': na,
      'On-Prem Last Logon': na,
    };
  }

  return {
    'Display Name': row.displayName,
    'User Principal Name': row.userPrincipalName,
    'Email': row.email ?? '',
    'Identity Type': 'User',
    'Employee Type': row.employeeType ?? '',
    'User Type': row.userType ?? '',
    'Country': row.country ?? PLACEHOLDER.UNKNOWN,
    'Account Status': accountStatusLabel(row.accountEnabled),
    'Created Date': formatDate(row.createdAt),
    'License Status': licenseStatusLabel(row),
    'Target Licenses': row.matchedTargetSkuNames.join('; '),
    'All Licenses': row.assignedLicenseNames.join('; '),
    'Mailbox Type': mailboxLabel(row),
    'Last Activity': row.activity.lastActivity
      ? formatDateTime(row.activity.lastActivity)
      : PLACEHOLDER.NEVER,
    'Activity Source': row.activity.source,
    'Days Since Activity': daysSinceLabel(row),
    'On-Prem Last Logon': onPremLabel(row),
  };
}

function licenseRank(row: ReportRow): number {
  if (row.kind === 'servicePrincipal') return 2;
  return row.hasTargetLicense ? 0 : 1;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Licensed users first, then by account status, mailbox type and name.
 */
export function sortRows(rows: ReportRow[]): ReportRow[] {
  return [...rows].sort(
    (a, b) =>
      licenseRank(a) - licenseRank(b) ||
      compareText(accountStatusLabel(a.accountEnabled), accountStatusLabel(b.accountEnabled)) ||
      compareText(mailboxLabel(a), mailboxLabel(b)) ||
      compareText(a.displayName, b.displayName)
  );
}

export function toCsv(rows: ReportRow[]): string {
  return stringify(rows.map(renderRow), {
    header: true,
    columns: [...REPORT_COLUMNS],
  });
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function reportFileName(now: Date): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `${REPORT.FILE_PREFIX}-${date}-${time}.csv`;
}

/**
 * Write the sorted report to the output directory and return the file path.
 */
export function writeReport(result: ReportResult, outputDir: string, now: Date = new Date()): string {
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  const filePath = path.join(outputDir, reportFileName(now));
  fs.writeFileSync(filePath, toCsv(sortRows(result.rows)), 'utf-8');

  logger.info(`Wrote ${result.rows.length} row(s) to ${filePath}`);
  return filePath;
}
