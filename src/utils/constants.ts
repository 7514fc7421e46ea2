/**
 * Application Constants
 */

// Graph API
export const GRAPH_API = {
  SCOPES: ['https://graph.microsoft.com/.default'],
  PAGE_SIZE: 999,

  USER_FIELDS: [
    'id',
    'displayName',
    'userPrincipalName',
    'mail',
    'country',
    'createdDateTime',
    'employeeType',
    'userType',
    'accountEnabled',
    'assignedLicenses',
    'signInActivity',
  ],
  SERVICE_PRINCIPAL_FIELDS: ['id', 'appId', 'displayName', 'accountEnabled', 'createdDateTime'],
};

// Report defaults
export const REPORT = {
  TARGET_SKUS: ['ENTERPRISEPREMIUM', 'SPE_E5'] as const,
  INACTIVE_DAYS: 90,
  EMPLOYEE_TYPES: ['Employee', 'FTE', 'Permanent'] as const,
  FILE_PREFIX: 'license-report',
};

// Placeholders written to the export
export const PLACEHOLDER = {
  NOT_APPLICABLE: 'N/A',
  NOT_AVAILABLE: 'Not available',
  UNKNOWN: 'Unknown',
  NEVER: 'Never',
};

// Values directories return instead of a timestamp
export const TIMESTAMP_PLACEHOLDERS = ['-', 'n/a', 'never', 'null', 'none'];

// Application paths
export const PATHS = {
  OUTPUT_DIR: process.env.REPORT_OUTPUT_DIR || 'reports',
  LOG_DIR: process.env.REPORT_LOG_DIR || 'logs',
};
