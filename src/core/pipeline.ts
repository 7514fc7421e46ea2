/**
 * Report Pipeline
 * Fetches each source once, in order, and builds the report
 */

import { v4 as uuidv4 } from 'uuid';
import {
  IdentityDirectoryProvider,
  LicenseCatalogProvider,
  MailboxDirectoryProvider,
  OnPremDirectoryProvider,
  OnPremLogon,
  ReportOptions,
  ReportResult,
  ServiceIdentity,
} from '../types';
import { logger } from '../utils/logger';
import { buildReport } from './report';
import { resolveSkus, DEFAULT_TARGET_SKUS } from './sku';

export interface ReportProviders {
  catalog: LicenseCatalogProvider;
  identities: IdentityDirectoryProvider;
  mailboxes: MailboxDirectoryProvider;
  onPrem?: OnPremDirectoryProvider;
}

export interface PipelineOptions extends ReportOptions {
  targetProductNames?: readonly string[];
  includeServicePrincipals?: boolean;
}

export interface PipelineProgress {
  phase: 'catalog' | 'users' | 'servicePrincipals' | 'mailboxes' | 'onPrem' | 'building' | 'complete';
  processed?: number;
  total?: number;
}

export type PipelineProgressCallback = (progress: PipelineProgress) => void;

export interface PipelineResult extends ReportResult {
  runId: string;
  generatedAt: Date;
}

/**
 * Run the report against live collaborators.
 *
 * The catalog is fetched and checked first, so a tenant without any target
 * SKU fails before users and mailboxes are read.
 */
export async function runReport(
  providers: ReportProviders,
  options: PipelineOptions = {},
  onProgress?: PipelineProgressCallback
): Promise<PipelineResult> {
  const runId = uuidv4();
  const now = options.now ?? new Date();
  const targetProductNames = options.targetProductNames ?? DEFAULT_TARGET_SKUS;

  logger.info(`Starting report run ${runId}`);

  onProgress?.({ phase: 'catalog' });
  const catalog = await providers.catalog.listSubscribedSkus();
  const skus = resolveSkus(catalog, targetProductNames);

  onProgress?.({ phase: 'users' });
  const users = await providers.identities.listUsers();

  let servicePrincipals: ServiceIdentity[] | undefined;
  if (options.includeServicePrincipals) {
    onProgress?.({ phase: 'servicePrincipals' });
    servicePrincipals = await providers.identities.listServicePrincipals();
  }

  onProgress?.({ phase: 'mailboxes' });
  const mailboxes = await providers.mailboxes.listMailboxes((processed, total) =>
    onProgress?.({ phase: 'mailboxes', processed, total })
  );

  let onPremLogons: OnPremLogon[] | undefined;
  if (providers.onPrem) {
    onProgress?.({ phase: 'onPrem' });
    onPremLogons = await providers.onPrem.listLastLogons();
  }

  const result = buildReport(
    {
      catalog,
      users,
      servicePrincipals,
      mailboxes,
      onPremLogons,
      targetProductNames,
      skus,
      options: {
        now,
        inactiveDays: options.inactiveDays,
        validateEmployeeType: options.validateEmployeeType,
        employeeTypeAllowList: options.employeeTypeAllowList,
      },
    },
    (processed, total) => onProgress?.({ phase: 'building', processed, total })
  );

  onProgress?.({ phase: 'complete' });
  logger.info(`Finished report run ${runId}`);

  return { ...result, runId, generatedAt: now };
}
