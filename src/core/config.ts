/**
 * Configuration
 * Reads app registration credentials and report settings from the environment
 */

import path from 'path';
import { AzureConfig } from '../types';
import { PATHS, REPORT } from '../utils/constants';
import { ConfigurationError } from '../utils/errors';

const GUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

type Env = Record<string, string | undefined>;

/**
 * Validate app registration credentials
 */
export function validateAzureConfig(azure: AzureConfig): string[] {
  const errors: string[] = [];

  if (!azure.tenantId || !GUID_PATTERN.test(azure.tenantId)) {
    errors.push('Invalid tenant ID format (expected GUID)');
  }

  if (!azure.clientId || !GUID_PATTERN.test(azure.clientId)) {
    errors.push('Invalid client ID format (expected GUID)');
  }

  if (!azure.clientSecret || azure.clientSecret.length < 10) {
    errors.push('Client secret is required and must be at least 10 characters');
  }

  return errors;
}

export function loadAzureConfig(env: Env = process.env): AzureConfig {
  const azure: AzureConfig = {
    tenantId: (env.ENTRA_TENANT_ID ?? '').trim(),
    clientId: (env.ENTRA_CLIENT_ID ?? '').trim(),
    clientSecret: env.ENTRA_CLIENT_SECRET ?? '',
  };

  const errors = validateAzureConfig(azure);
  if (errors.length > 0) {
    throw new ConfigurationError('Invalid Entra ID app registration settings', errors);
  }

  return azure;
}

export function resolveOutputDir(option?: string, env: Env = process.env): string {
  return path.resolve(option || env.REPORT_OUTPUT_DIR || PATHS.OUTPUT_DIR);
}

/**
 * Parse the --inactive-days option
 */
export function parseInactiveDays(value?: string): number {
  if (value === undefined) {
    return REPORT.INACTIVE_DAYS;
  }

  const days = Number(value);
  if (!Number.isInteger(days) || days < 1) {
    throw new ConfigurationError(`Invalid inactivity threshold: ${value}`);
  }
  return days;
}

/**
 * Normalize --sku values; accepts repeated and comma-separated names
 */
export function parseTargetSkus(values?: string[]): string[] {
  if (!values || values.length === 0) {
    return [...REPORT.TARGET_SKUS];
  }

  const names = values
    .flatMap((v) => v.split(','))
    .map((v) => v.trim().toUpperCase())
    .filter(Boolean);

  if (names.length === 0) {
    throw new ConfigurationError('At least one target SKU is required');
  }
  return Array.from(new Set(names));
}
