/**
 * License Activity Report - target-license, mailbox and sign-in report for Entra ID tenants
 */

export * from './types';
export * from './core';
export * from './utils/constants';
export * from './utils/errors';
export * from './utils/logger';
