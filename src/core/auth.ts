/**
 * Entra ID Authentication
 * Handles MSAL client-credentials authentication for Microsoft Graph API
 */

import {
  ConfidentialClientApplication,
  Configuration,
  AuthenticationResult,
} from '@azure/msal-node';
import { AzureConfig, TokenCache } from '../types';
import { GRAPH_API } from '../utils/constants';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

export class AuthManager {
  private clients: Map<string, ConfidentialClientApplication> = new Map();
  private tokenCache: TokenCache = {};

  /**
   * Get or create MSAL client for an app registration
   */
  private getClient(azure: AzureConfig): ConfidentialClientApplication {
    const cacheKey = `${azure.tenantId}:${azure.clientId}`;

    const existing = this.clients.get(cacheKey);
    if (existing) {
      return existing;
    }

    const config: Configuration = {
      auth: {
        clientId: azure.clientId,
        clientSecret: azure.clientSecret,
        authority: `https://login.microsoftonline.com/${azure.tenantId}`,
      },
      system: {
        loggerOptions: {
          loggerCallback: (level, message) => {
            if (level <= 1) {
              logger.debug(`MSAL: ${message}`);
            }
          },
          piiLoggingEnabled: false,
          logLevel: 0,
        },
      },
    };

    const client = new ConfidentialClientApplication(config);
    this.clients.set(cacheKey, client);

    return client;
  }

  /**
   * Acquire access token using client credentials flow
   */
  async getAccessToken(azure: AzureConfig): Promise<string> {
    const cached = this.tokenCache[azure.tenantId];
    if (cached && cached.expiresAt > new Date()) {
      logger.debug(`Using cached token for tenant ${azure.tenantId}`);
      return cached.accessToken;
    }

    logger.debug(`Acquiring new token for tenant ${azure.tenantId}`);

    const client = this.getClient(azure);

    let result: AuthenticationResult | null;
    try {
      result = await client.acquireTokenByClientCredential({
        scopes: GRAPH_API.SCOPES,
      });
    } catch (error) {
      logger.error(`Failed to acquire token for tenant ${azure.tenantId}: ${describeError(error)}`);
      throw new Error(`Authentication failed: ${describeError(error)}`);
    }

    if (!result || !result.accessToken) {
      throw new Error('Authentication failed: no access token returned');
    }

    const expiresAt = result.expiresOn || new Date(Date.now() + 3600 * 1000);
    this.tokenCache[azure.tenantId] = {
      accessToken: result.accessToken,
      expiresAt: new Date(expiresAt),
    };

    logger.info(`Acquired access token for tenant ${azure.tenantId} (expires: ${expiresAt})`);
    return result.accessToken;
  }

  /**
   * Test authentication for an app registration
   */
  async testAuth(azure: AzureConfig): Promise<boolean> {
    try {
      await this.getAccessToken(azure);
      return true;
    } catch (error) {
      logger.warn(`Authentication test failed: ${describeError(error)}`);
      return false;
    }
  }
}

// Singleton instance
export const authManager = new AuthManager();
