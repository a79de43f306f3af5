/**
 * Azure AD Authentication
 * App-only MSAL tokens for Microsoft Graph
 */

import {
  ConfidentialClientApplication,
  Configuration,
  AuthenticationResult,
} from '@azure/msal-node';
import { AccessTokenProvider, AzureConfig, TokenCache } from '../types';
import { GRAPH_API } from '../utils/constants';
import { PermanentRemoteError, toErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

// Refresh this long before the token actually expires
const EXPIRY_SKEW_MS = 5 * 60 * 1000;

export class AuthManager {
  private clients: Map<string, ConfidentialClientApplication> = new Map();
  private tokenCache: TokenCache = {};

  /**
   * Get or create MSAL client for a tenant
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
    const { tenantId } = azure;

    const cached = this.tokenCache[tenantId];
    if (cached && cached.expiresAt.getTime() - EXPIRY_SKEW_MS > Date.now()) {
      logger.debug(`Using cached token for tenant ${tenantId}`);
      return cached.accessToken;
    }

    logger.debug(`Acquiring new token for tenant ${tenantId}`);

    const client = this.getClient(azure);

    let result: AuthenticationResult | null;
    try {
      result = await client.acquireTokenByClientCredential({
        scopes: GRAPH_API.SCOPES,
      });
    } catch (error) {
      const message = toErrorMessage(error);
      logger.error(`Failed to acquire token for tenant ${tenantId}: ${message}`);
      throw new PermanentRemoteError(`Authentication failed: ${message}`, 'auth');
    }

    if (!result || !result.accessToken) {
      throw new PermanentRemoteError('Authentication failed: no access token returned', 'auth');
    }

    const expiresAt = result.expiresOn ?? new Date(Date.now() + 3600 * 1000);
    this.tokenCache[tenantId] = {
      accessToken: result.accessToken,
      expiresAt: new Date(expiresAt),
    };

    logger.info(`Acquired access token for tenant ${tenantId} (expires: ${expiresAt.toISOString()})`);
    return result.accessToken;
  }

  /**
   * Token source bound to one tenant's credentials
   */
  providerFor(azure: AzureConfig): AccessTokenProvider {
    return {
      getAccessToken: () => this.getAccessToken(azure),
    };
  }

  /**
   * Test authentication for a tenant
   */
  async testAuth(azure: AzureConfig): Promise<boolean> {
    try {
      await this.getAccessToken(azure);
      return true;
    } catch (error) {
      logger.debug(`Authentication test failed: ${toErrorMessage(error)}`);
      return false;
    }
  }

  /**
   * Clear cached token for a tenant
   */
  clearCache(tenantId?: string): void {
    if (tenantId) {
      delete this.tokenCache[tenantId];
      for (const key of this.clients.keys()) {
        if (key.startsWith(`${tenantId}:`)) {
          this.clients.delete(key);
        }
      }
    } else {
      this.tokenCache = {};
      this.clients.clear();
    }
  }
}

// Singleton instance
export const authManager = new AuthManager();
