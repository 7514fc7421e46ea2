/**
 * License Activity Report Core Types
 */

// ============================================================================
// Azure Configuration
// ============================================================================

export interface AzureConfig {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

// ============================================================================
// Source Data
// ============================================================================

export interface CatalogEntry {
  skuPartNumber: string;
  skuId: string;
  consumedUnits?: number;
  enabledUnits?: number;
}

export interface UserIdentity {
  id: string;
  displayName: string;
  userPrincipalName: string;
  mail?: string | null;
  country?: string | null;
  createdDateTime?: string | null;
  employeeType?: string | null;
  userType?: string | null;
  accountEnabled: boolean;
  assignedSkuIds: string[];
  // Raw value as returned by the directory; may be a placeholder
  lastSignIn?: unknown;
}

export interface ServiceIdentity {
  id: string;
  appId: string;
  displayName: string;
  accountEnabled: boolean;
  createdDateTime?: string | null;
}

export interface MailboxRecord {
  displayName?: string;
  userPrincipalName?: string | null;
  primarySmtpAddress?: string | null;
  recipientTypeDetails: string;
}

export interface OnPremLogon {
  userPrincipalName: string;
  lastLogon: unknown;
}

// ============================================================================
// Collaborators
// ============================================================================

export interface LicenseCatalogProvider {
  listSubscribedSkus(): Promise<CatalogEntry[]>;
}

export interface IdentityDirectoryProvider {
  listUsers(): Promise<UserIdentity[]>;
  listServicePrincipals(): Promise<ServiceIdentity[]>;
}

export type MailboxProgress = (checked: number, total: number) => void;

export interface MailboxDirectoryProvider {
  listMailboxes(onProgress?: MailboxProgress): Promise<MailboxRecord[]>;
}

export interface OnPremDirectoryProvider {
  listLastLogons(): Promise<OnPremLogon[]>;
}

// ============================================================================
// Classification
// ============================================================================

export type RecipientKind =
  | 'SharedMailbox'
  | 'RoomMailbox'
  | 'EquipmentMailbox'
  | 'DiscoveryMailbox'
  | 'UserMailbox';

export type MailboxClassification = RecipientKind | 'None';

export type ActivitySource = 'Cloud' | 'OnPrem' | 'None';

export interface ResolvedActivity {
  source: ActivitySource;
  lastActivity: Date | null;
  daysSince: number | null;
}

export interface SkuResolution {
  targets: Map<string, string | null>;
  namesById: Map<string, string>;
  targetSkuIds: Set<string>;
}

// ============================================================================
// Report
// ============================================================================

export interface UserReportRow {
  kind: 'user';
  displayName: string;
  userPrincipalName: string;
  email: string | null;
  employeeType: string | null;
  employeeTypeFlagged: boolean;
  userType: string | null;
  country: string | null;
  accountEnabled: boolean;
  createdAt: Date | null;
  assignedLicenseNames: string[];
  matchedTargetSkuNames: string[];
  hasTargetLicense: boolean;
  mailbox: MailboxClassification;
  activity: ResolvedActivity;
  // undefined when no on-prem directory was queried
  onPremLastLogon?: Date | null;
}

export interface ServicePrincipalReportRow {
  kind: 'servicePrincipal';
  displayName: string;
  appId: string;
  accountEnabled: boolean;
  createdAt: Date | null;
}

export type ReportRow = UserReportRow | ServicePrincipalReportRow;

export interface ReportCounters {
  totalLicensed: number;
  licensedDisabled: number;
  licensedShared: number;
  licensedInactive: number;
}

export interface ReportOptions {
  now?: Date;
  inactiveDays?: number;
  validateEmployeeType?: boolean;
  employeeTypeAllowList?: readonly string[];
}

export interface ReportInput {
  catalog: CatalogEntry[];
  users: UserIdentity[];
  servicePrincipals?: ServiceIdentity[];
  mailboxes: MailboxRecord[];
  onPremLogons?: OnPremLogon[];
  targetProductNames?: readonly string[];
  // Already-resolved SKUs; resolved from catalog and targetProductNames when absent
  skus?: SkuResolution;
  options?: ReportOptions;
}

export interface ReportResult {
  rows: ReportRow[];
  counters: ReportCounters;
  flagged: string[];
  skus: SkuResolution;
}

// ============================================================================
// Authentication
// ============================================================================

export interface AuthToken {
  accessToken: string;
  expiresAt: Date;
}

export interface TokenCache {
  [tenantId: string]: AuthToken;
}
