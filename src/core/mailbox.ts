/**
 * Mailbox Classification
 * Indexes mailbox records by UPN and primary address
 */

import { MailboxClassification, MailboxRecord, RecipientKind } from '../types';
import { logger } from '../utils/logger';

const RECIPIENT_KINDS = new Map<string, RecipientKind>([
  ['sharedmailbox', 'SharedMailbox'],
  ['roommailbox', 'RoomMailbox'],
  ['equipmentmailbox', 'EquipmentMailbox'],
  ['discoverymailbox', 'DiscoveryMailbox'],
  ['usermailbox', 'UserMailbox'],
]);

export type MailboxIndex = Map<string, RecipientKind>;

export function normalizeKey(value: string | null | undefined): string | null {
  if (!value) return null;
  const key = value.trim().toLowerCase();
  return key.length > 0 ? key : null;
}

/**
 * Anything that is not a known special-purpose kind is treated as a user mailbox.
 */
export function toRecipientKind(raw: string | null | undefined): RecipientKind {
  const key = normalizeKey(raw);
  return (key && RECIPIENT_KINDS.get(key)) || 'UserMailbox';
}

/**
 * Build the lookup from normalized UPN/address to recipient kind.
 * The first record seen for a key wins.
 */
export function buildMailboxIndex(records: MailboxRecord[]): MailboxIndex {
  const index: MailboxIndex = new Map();
  let duplicates = 0;

  for (const record of records) {
    const kind = toRecipientKind(record.recipientTypeDetails);
    const keys = [normalizeKey(record.userPrincipalName), normalizeKey(record.primarySmtpAddress)];

    for (const key of keys) {
      if (!key) continue;
      if (index.has(key)) {
        if (index.get(key) !== kind) duplicates++;
        continue;
      }
      index.set(key, kind);
    }
  }

  if (duplicates > 0) {
    logger.warn(`${duplicates} mailbox key(s) matched more than one mailbox kind; kept the first`);
  }
  logger.info(`Indexed ${records.length} mailbox(es) under ${index.size} key(s)`);
  return index;
}

export function classifyMailbox(
  index: MailboxIndex,
  userPrincipalName: string,
  email?: string | null
): MailboxClassification {
  const upnKey = normalizeKey(userPrincipalName);
  if (upnKey) {
    const kind = index.get(upnKey);
    if (kind) return kind;
  }

  const emailKey = normalizeKey(email);
  if (emailKey) {
    const kind = index.get(emailKey);
    if (kind) return kind;
  }

  return 'None';
}
