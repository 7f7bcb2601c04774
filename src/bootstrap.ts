import type { AppConfig } from './config/appConfig';
import type { MercedesConfig, TokenStoreConfig } from './config/mercedesConfig';
import { FileTokenStore } from './db/fileTokenStore';
import type { TokenStore } from './db/tokenStore';
import { MercedesTokenClient } from './integrations/mercedes/tokenEndpoint.client';
import { MercedesVehicleDataClient } from './integrations/mercedes/vehicleData.client';
import type { AppServices } from './app';
import { AuthorizationFlow } from './services/authorizationFlow.service';
import { MetricsCollector } from './services/metricsCollector.service';
import { TokenManager } from './services/tokenManager.service';

export const createTokenStore = (config: TokenStoreConfig): TokenStore =>
  new FileTokenStore(config.statePath);

export type ServiceConfig = {
  app: AppConfig;
  mercedes: MercedesConfig;
  tokenStore: TokenStoreConfig;
};

export const createServices = async (config: ServiceConfig): Promise<AppServices> => {
  const { mercedes } = config;
  const store = createTokenStore(config.tokenStore);

  const tokenManager = await TokenManager.create({
    store,
    grants: new MercedesTokenClient({
      tokenUrl: mercedes.tokenUrl,
      clientId: mercedes.clientId,
      clientSecret: mercedes.clientSecret,
      redirectUri: mercedes.redirectUri,
      timeoutMs: mercedes.tokenTimeoutMs,
    }),
    requiredScopes: mercedes.requiredScopes,
    safetyMarginMs: mercedes.safetyMarginMs,
  });

  const authorizationFlow = new AuthorizationFlow({
    tokenManager,
    authorizationUrl: mercedes.authorizationUrl,
    clientId: mercedes.clientId,
    redirectUri: mercedes.redirectUri,
    scopes: mercedes.scopes,
    attemptTtlMs: mercedes.authorizationTtlMs,
  });

  const metricsCollector = new MetricsCollector({
    tokenManager,
    client: new MercedesVehicleDataClient({
      baseUrl: mercedes.apiBaseUrl,
      timeoutMs: mercedes.apiTimeoutMs,
    }),
    vin: mercedes.vin,
    collectDefaults: config.app.metrics.defaultCollectors,
  });

  return { tokenManager, authorizationFlow, metricsCollector };
};
