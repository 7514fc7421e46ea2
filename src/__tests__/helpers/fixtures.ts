import {
  CatalogEntry,
  MailboxRecord,
  ServiceIdentity,
  UserIdentity,
} from '../../types';

export const NOW = new Date('2024-06-01T00:00:00Z');

export const SKU_E5 = 'sku-office-e5';
export const SKU_M365_E5 = 'sku-m365-e5';
export const SKU_E1 = 'sku-office-e1';

export const catalog: CatalogEntry[] = [
  { skuPartNumber: 'ENTERPRISEPREMIUM', skuId: SKU_E5, consumedUnits: 10, enabledUnits: 25 },
  { skuPartNumber: 'SPE_E5', skuId: SKU_M365_E5, consumedUnits: 3, enabledUnits: 5 },
  { skuPartNumber: 'STANDARDPACK', skuId: SKU_E1, consumedUnits: 40, enabledUnits: 50 },
];

let counter = 0;

export function makeUser(overrides: Partial<UserIdentity> = {}): UserIdentity {
  counter++;
  return {
    id: `user-${counter}`,
    displayName: `User ${counter}`,
    userPrincipalName: `user${counter}@contoso.test`,
    mail: null,
    country: null,
    createdDateTime: null,
    employeeType: null,
    userType: 'Member',
    accountEnabled: true,
    assignedSkuIds: [],
    lastSignIn: null,
    ...overrides,
  };
}

export function makeServicePrincipal(overrides: Partial<ServiceIdentity> = {}): ServiceIdentity {
  counter++;
  return {
    id: `sp-${counter}`,
    appId: `app-${counter}`,
    displayName: `App ${counter}`,
    accountEnabled: true,
    createdDateTime: null,
    ...overrides,
  };
}

export function mailbox(
  userPrincipalName: string | null,
  recipientTypeDetails: string,
  primarySmtpAddress: string | null = null
): MailboxRecord {
  return { userPrincipalName, primarySmtpAddress, recipientTypeDetails };
}
