/**
 * Microsoft Graph API Client
 * Reads the license catalog, users, service principals and mailbox settings
 */

import { Client, GraphError } from '@microsoft/microsoft-graph-client';
import 'isomorphic-fetch';
import {
  AzureConfig,
  CatalogEntry,
  IdentityDirectoryProvider,
  LicenseCatalogProvider,
  MailboxDirectoryProvider,
  MailboxProgress,
  MailboxRecord,
  ServiceIdentity,
  UserIdentity,
} from '../types';
import { GRAPH_API } from '../utils/constants';
import { authManager } from './auth';
import { logger } from '../utils/logger';

interface GraphPage<T> {
  value: T[];
  '@odata.nextLink'?: string;
}

interface GraphSubscribedSku {
  skuId: string;
  skuPartNumber: string;
  consumedUnits?: number;
  prepaidUnits?: { enabled?: number };
}

interface GraphUser {
  id: string;
  displayName?: string | null;
  userPrincipalName: string;
  mail?: string | null;
  country?: string | null;
  createdDateTime?: string | null;
  employeeType?: string | null;
  userType?: string | null;
  accountEnabled?: boolean | null;
  assignedLicenses?: Array<{ skuId: string }>;
  signInActivity?: { lastSignInDateTime?: string | null } | null;
}

interface GraphServicePrincipal {
  id: string;
  appId: string;
  displayName?: string | null;
  accountEnabled?: boolean | null;
  createdDateTime?: string | null;
}

interface GraphMailboxSettings {
  userPurpose?: string | null;
}

// mailboxSettings.userPurpose -> Exchange RecipientTypeDetails
const USER_PURPOSE_KINDS = new Map<string, string>([
  ['user', 'UserMailbox'],
  ['linked', 'UserMailbox'],
  ['shared', 'SharedMailbox'],
  ['room', 'RoomMailbox'],
  ['equipment', 'EquipmentMailbox'],
]);

export class GraphClient
  implements LicenseCatalogProvider, IdentityDirectoryProvider, MailboxDirectoryProvider
{
  private client: Client;
  private users: UserIdentity[] | null = null;

  constructor(accessToken: string) {
    this.client = Client.init({
      authProvider: (done) => {
        done(null, accessToken);
      },
    });
  }

  /**
   * Create a Graph client for an app registration
   */
  static async connect(azure: AzureConfig): Promise<GraphClient> {
    const token = await authManager.getAccessToken(azure);
    return new GraphClient(token);
  }

  /**
   * Follow @odata.nextLink until every page has been read
   */
  private async getAll<T>(endpoint: string, version: 'v1.0' | 'beta' = 'v1.0'): Promise<T[]> {
    const items: T[] = [];
    let page: GraphPage<T> = await this.client.api(endpoint).version(version).get();
    items.push(...page.value);

    let nextLink = page['@odata.nextLink'];
    while (nextLink) {
      page = await this.client.api(nextLink).get();
      items.push(...page.value);
      nextLink = page['@odata.nextLink'];
    }

    return items;
  }

  async listSubscribedSkus(): Promise<CatalogEntry[]> {
    const skus = await this.getAll<GraphSubscribedSku>(
      '/subscribedSkus?$select=skuId,skuPartNumber,consumedUnits,prepaidUnits'
    );

    logger.info(`Found ${skus.length} subscribed SKU(s)`);
    return skus.map((sku) => ({
      skuId: sku.skuId,
      skuPartNumber: sku.skuPartNumber,
      consumedUnits: sku.consumedUnits,
      enabledUnits: sku.prepaidUnits?.enabled,
    }));
  }

  /**
   * List member and guest users with sign-in activity.
   * signInActivity needs AuditLog.Read.All and an Entra ID P1 tenant.
   */
  async listUsers(): Promise<UserIdentity[]> {
    if (this.users) {
      return this.users;
    }

    const select = GRAPH_API.USER_FIELDS.join(',');
    const users = await this.getAll<GraphUser>(`/users?$select=${select}&$top=${GRAPH_API.PAGE_SIZE}`);

    this.users = users.map((user) => ({
      id: user.id,
      displayName: user.displayName || user.userPrincipalName,
      userPrincipalName: user.userPrincipalName,
      mail: user.mail,
      country: user.country,
      createdDateTime: user.createdDateTime,
      employeeType: user.employeeType,
      userType: user.userType,
      accountEnabled: user.accountEnabled === true,
      assignedSkuIds: (user.assignedLicenses ?? []).map((l) => l.skuId),
      lastSignIn: user.signInActivity?.lastSignInDateTime,
    }));

    logger.info(`Found ${this.users.length} user(s)`);
    return this.users;
  }

  /**
   * createdDateTime on service principals is only exposed by the beta endpoint
   */
  async listServicePrincipals(): Promise<ServiceIdentity[]> {
    const select = GRAPH_API.SERVICE_PRINCIPAL_FIELDS.join(',');
    const principals = await this.getAll<GraphServicePrincipal>(
      `/servicePrincipals?$select=${select}&$top=${GRAPH_API.PAGE_SIZE}`,
      'beta'
    );

    logger.info(`Found ${principals.length} service principal(s)`);
    return principals.map((sp) => ({
      id: sp.id,
      appId: sp.appId,
      displayName: sp.displayName || sp.appId,
      accountEnabled: sp.accountEnabled === true,
      createdDateTime: sp.createdDateTime,
    }));
  }

  /**
   * Read each user's mailbox purpose. Users without an Exchange Online
   * mailbox answer 404 and are left out.
   */
  async listMailboxes(onProgress?: MailboxProgress): Promise<MailboxRecord[]> {
    const users = await this.listUsers();
    const mailboxes: MailboxRecord[] = [];
    let checked = 0;

    for (const user of users) {
      const settings = await this.getMailboxSettings(user.id);
      checked++;
      onProgress?.(checked, users.length);

      if (!settings) continue;

      const purpose = (settings.userPurpose || '').toLowerCase();
      mailboxes.push({
        displayName: user.displayName,
        userPrincipalName: user.userPrincipalName,
        primarySmtpAddress: user.mail,
        recipientTypeDetails: USER_PURPOSE_KINDS.get(purpose) ?? purpose,
      });
    }

    logger.info(`Found ${mailboxes.length} mailbox(es) for ${users.length} user(s)`);
    return mailboxes;
  }

  private async getMailboxSettings(userId: string): Promise<GraphMailboxSettings | null> {
    try {
      const settings: GraphMailboxSettings = await this.client
        .api(`/users/${userId}/mailboxSettings`)
        .select('userPurpose')
        .get();
      return settings;
    } catch (error) {
      if (error instanceof GraphError && error.statusCode === 404) {
        logger.debug(`No mailbox for user ${userId}`);
        return null;
      }
      throw error;
    }
  }
}
