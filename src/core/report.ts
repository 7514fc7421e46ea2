/**
 * Report Builder
 * Joins catalog, identity, mailbox and logon data into one row per identity
 */

import {
  OnPremLogon,
  ReportCounters,
  ReportInput,
  ReportResult,
  ReportRow,
  ServiceIdentity,
  ServicePrincipalReportRow,
  SkuResolution,
  UserIdentity,
  UserReportRow,
} from '../types';
import { REPORT } from '../utils/constants';
import { logger } from '../utils/logger';
import { resolveSkus, matchTargetSkus, licenseNames, DEFAULT_TARGET_SKUS } from './sku';
import { buildMailboxIndex, classifyMailbox, normalizeKey, MailboxIndex } from './mailbox';
import { mergeSignIn, parseTimestamp } from './signin';

export type RowCallback = (processed: number, total: number, row: ReportRow) => void;

interface UserContext {
  skus: SkuResolution;
  mailboxes: MailboxIndex;
  onPrem?: Map<string, unknown>;
  now: Date;
  validateEmployeeType: boolean;
  allowedEmployeeTypes: Set<string>;
}

export function emptyCounters(): ReportCounters {
  return {
    totalLicensed: 0,
    licensedDisabled: 0,
    licensedShared: 0,
    licensedInactive: 0,
  };
}

/**
 * Lower-cased UPN to raw last-logon value. Repeated UPNs keep the first entry.
 */
export function buildLogonLookup(logons: OnPremLogon[]): Map<string, unknown> {
  const lookup = new Map<string, unknown>();
  for (const logon of logons) {
    const key = normalizeKey(logon.userPrincipalName);
    if (key && !lookup.has(key)) {
      lookup.set(key, logon.lastLogon);
    }
  }
  return lookup;
}

export function isAllowedEmployeeType(value: string, allowed: Set<string>): boolean {
  return allowed.has(value.trim().toLowerCase());
}

export function buildUserRow(user: UserIdentity, ctx: UserContext): UserReportRow {
  const matchedTargetSkuNames = matchTargetSkus(user.assignedSkuIds, ctx.skus);
  const email = user.mail?.trim() || null;

  let employeeType = user.employeeType?.trim() || null;
  let employeeTypeFlagged = false;
  if (
    ctx.validateEmployeeType &&
    employeeType &&
    !isAllowedEmployeeType(employeeType, ctx.allowedEmployeeTypes)
  ) {
    employeeType = email ?? user.userPrincipalName;
    employeeTypeFlagged = true;
  }

  const upnKey = normalizeKey(user.userPrincipalName);
  const onPremRaw = ctx.onPrem && upnKey ? ctx.onPrem.get(upnKey) : undefined;

  const row: UserReportRow = {
    kind: 'user',
    displayName: user.displayName,
    userPrincipalName: user.userPrincipalName,
    email,
    employeeType,
    employeeTypeFlagged,
    userType: user.userType?.trim() || null,
    country: user.country?.trim() || null,
    accountEnabled: user.accountEnabled,
    createdAt: parseTimestamp(user.createdDateTime),
    assignedLicenseNames: licenseNames(user.assignedSkuIds, ctx.skus),
    matchedTargetSkuNames,
    hasTargetLicense: matchedTargetSkuNames.length > 0,
    mailbox: classifyMailbox(ctx.mailboxes, user.userPrincipalName, email),
    activity: mergeSignIn(user.lastSignIn, onPremRaw, ctx.now),
  };

  if (ctx.onPrem) {
    row.onPremLastLogon = parseTimestamp(onPremRaw);
  }

  return row;
}

export function buildServicePrincipalRow(sp: ServiceIdentity): ServicePrincipalReportRow {
  return {
    kind: 'servicePrincipal',
    displayName: sp.displayName,
    appId: sp.appId,
    accountEnabled: sp.accountEnabled,
    createdAt: parseTimestamp(sp.createdDateTime),
  };
}

export function countRow(counters: ReportCounters, row: UserReportRow, inactiveDays: number): void {
  if (!row.hasTargetLicense) return;

  counters.totalLicensed++;
  if (!row.accountEnabled) counters.licensedDisabled++;
  if (row.mailbox === 'SharedMailbox') counters.licensedShared++;

  // On-prem recency is whole-day precision and is left out of this figure
  if (
    row.activity.source === 'Cloud' &&
    row.activity.daysSince !== null &&
    row.activity.daysSince > inactiveDays
  ) {
    counters.licensedInactive++;
  }
}

/**
 * Build the report from already-fetched source data.
 *
 * SKUs are resolved before anything else, so a tenant without any target
 * license fails with a ConfigurationError and no rows.
 */
export function buildReport(input: ReportInput, onRow?: RowCallback): ReportResult {
  const options = input.options ?? {};
  const now = options.now ?? new Date();
  const inactiveDays = options.inactiveDays ?? REPORT.INACTIVE_DAYS;

  const skus =
    input.skus ?? resolveSkus(input.catalog, input.targetProductNames ?? DEFAULT_TARGET_SKUS);
  const mailboxes = buildMailboxIndex(input.mailboxes);
  const onPrem = input.onPremLogons ? buildLogonLookup(input.onPremLogons) : undefined;

  const ctx: UserContext = {
    skus,
    mailboxes,
    onPrem,
    now,
    validateEmployeeType: options.validateEmployeeType ?? false,
    allowedEmployeeTypes: new Set(
      (options.employeeTypeAllowList ?? REPORT.EMPLOYEE_TYPES).map((t) => t.toLowerCase())
    ),
  };

  const servicePrincipals = input.servicePrincipals ?? [];
  const total = input.users.length + servicePrincipals.length;
  const rows: ReportRow[] = [];
  const counters = emptyCounters();
  const flagged: string[] = [];

  for (const user of input.users) {
    const row = buildUserRow(user, ctx);
    countRow(counters, row, inactiveDays);
    if (row.employeeTypeFlagged) {
      flagged.push(user.userPrincipalName);
    }
    rows.push(row);
    onRow?.(rows.length, total, row);
  }

  for (const sp of servicePrincipals) {
    const row = buildServicePrincipalRow(sp);
    rows.push(row);
    onRow?.(rows.length, total, row);
  }

  logger.info(
    `Built ${rows.length} row(s): ${counters.totalLicensed} licensed, ` +
      `${counters.licensedDisabled} disabled, ${counters.licensedShared} shared, ` +
      `${counters.licensedInactive} inactive over ${inactiveDays} days`
  );
  if (flagged.length > 0) {
    logger.warn(`${flagged.length} identity(ies) have an unexpected employee type`);
  }

  return { rows, counters, flagged, skus };
}
