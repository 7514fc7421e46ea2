/**
 * Exported Directory Sources
 * Reads mailbox and on-prem logon exports produced by PowerShell Export-Csv
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import {
  MailboxDirectoryProvider,
  MailboxRecord,
  OnPremDirectoryProvider,
  OnPremLogon,
} from '../types';
import { SourceError, describeError } from '../utils/errors';
import { logger } from '../utils/logger';
import { parseFileTime } from './signin';

type CsvRecord = Map<string, string>;

/**
 * Parse CSV text into records keyed by lower-cased column name.
 * Export-Csv may prepend a "#TYPE ..." line, which is skipped.
 */
export function parseCsv(content: string, filePath: string): CsvRecord[] {
  const body = content.replace(/^\uFEFF?#TYPE[^\n]*\n/, '');

  let parsed: unknown;
  try {
    parsed = parse(body, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (error) {
    throw new SourceError(filePath, `Invalid CSV (${describeError(error)})`);
  }

  if (!Array.isArray(parsed)) {
    throw new SourceError(filePath, 'Invalid CSV');
  }

  return parsed.map((row: unknown) => {
    const record: CsvRecord = new Map();
    if (row && typeof row === 'object') {
      for (const [key, value] of Object.entries(row)) {
        record.set(key.toLowerCase(), typeof value === 'string' ? value : '');
      }
    }
    return record;
  });
}

function readCsv(filePath: string, required: string[][]): CsvRecord[] {
  if (!fs.existsSync(filePath)) {
    throw new SourceError(filePath, 'File not found');
  }

  const records = parseCsv(fs.readFileSync(filePath, 'utf-8'), filePath);
  const first = records[0];

  if (first) {
    // Each group lists alternatives; at least one must be present
    for (const group of required) {
      if (!group.some((column) => first.has(column.toLowerCase()))) {
        throw new SourceError(filePath, `Missing column ${group.join(' or ')}`);
      }
    }
  }

  return records;
}

function cell(record: CsvRecord, column: string): string | null {
  const value = record.get(column.toLowerCase());
  return value ? value : null;
}

/**
 * Mailboxes from `Get-EXOMailbox -ResultSize Unlimited | Export-Csv`.
 */
export class CsvMailboxSource implements MailboxDirectoryProvider {
  constructor(private filePath: string) {}

  async listMailboxes(): Promise<MailboxRecord[]> {
    const records = readCsv(this.filePath, [
      ['RecipientTypeDetails'],
      ['UserPrincipalName', 'PrimarySmtpAddress'],
    ]);

    const mailboxes = records.map((record) => ({
      displayName: cell(record, 'DisplayName') ?? undefined,
      userPrincipalName: cell(record, 'UserPrincipalName'),
      primarySmtpAddress: cell(record, 'PrimarySmtpAddress'),
      recipientTypeDetails: cell(record, 'RecipientTypeDetails') ?? '',
    }));

    logger.info(`Loaded ${mailboxes.length} mailbox(es) from ${this.filePath}`);
    return mailboxes;
  }
}

/**
 * Last logons from `Get-ADUser -Properties LastLogonDate,lastLogonTimestamp | Export-Csv`.
 * The FileTime attribute is preferred since LastLogonDate is written in the
 * exporting machine's locale; LastLogonDate is used when no FileTime is set.
 */
export class CsvLogonSource implements OnPremDirectoryProvider {
  constructor(private filePath: string) {}

  async listLastLogons(): Promise<OnPremLogon[]> {
    const records = readCsv(this.filePath, [
      ['UserPrincipalName'],
      ['LastLogonDate', 'lastLogonTimestamp'],
    ]);

    const logons: OnPremLogon[] = [];
    for (const record of records) {
      const userPrincipalName = cell(record, 'UserPrincipalName');
      if (!userPrincipalName) continue;

      const fileTime = cell(record, 'lastLogonTimestamp');
      const fromFileTime = fileTime ? parseFileTime(fileTime) : null;
      logons.push({
        userPrincipalName,
        lastLogon: fromFileTime ?? cell(record, 'LastLogonDate') ?? null,
      });
    }

    logger.info(`Loaded ${logons.length} on-prem logon record(s) from ${this.filePath}`);
    return logons;
  }
}
