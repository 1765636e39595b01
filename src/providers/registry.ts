import type { AppConfig } from '@/core/config';
import { loadEtfSymbols } from '@/core/etf_symbols';
import { createChildLogger } from '@/utils/logger';
import { DataSourceRouter } from './router';
import type { FetchFn } from './http_client';
import { TradierClient } from './tradier/client';
import { TradierProvider } from './tradier/provider';
import { YahooClient } from './yahoo/client';
import { YahooProvider } from './yahoo/provider';

const logger = createChildLogger('registry');

export interface RouterFactoryOptions {
  fetchImpl?: FetchFn;
  etfSymbols?: ReadonlySet<string>;
}

/**
 * Wire the concrete providers into a router with the standard priorities:
 * option data prefers Tradier (Greeks); history, fundamentals and earnings
 * prefer Yahoo (coverage).
 */
export function createRouter(config: AppConfig, options: RouterFactoryOptions = {}): DataSourceRouter {
  const { tradier: tradierCfg, yahoo: yahooCfg } = config.providers;
  const etfSymbols = options.etfSymbols ?? loadEtfSymbols(config.projectRoot);

  const tradierClient =
    tradierCfg.enabled && tradierCfg.token
      ? new TradierClient({
          token: tradierCfg.token,
          baseUrl: tradierCfg.baseUrl,
          fetchImpl: options.fetchImpl,
          rateLimit: {
            maxRequestsPerMinute: tradierCfg.maxRequestsPerMinute,
            maxConcurrent: tradierCfg.maxConcurrent,
          },
        })
      : null;

  if (tradierCfg.enabled && !tradierCfg.token) {
    logger.warn('TRADIER_TOKEN not set; live quotes and Greeks-rich chains unavailable');
  }

  const tradier = new TradierProvider(tradierClient, etfSymbols);
  const yahoo = new YahooProvider(
    new YahooClient({
      fetchImpl: options.fetchImpl,
      rateLimit: {
        maxRequestsPerMinute: yahooCfg.maxRequestsPerMinute,
        maxConcurrent: yahooCfg.maxConcurrent,
      },
    }),
    { enabled: yahooCfg.enabled, etfSymbols }
  );

  return new DataSourceRouter(
    {
      ohlcv: [yahoo, tradier],
      fundamentals: [yahoo],
      optionsChain: [tradier, yahoo],
      earningsDate: [yahoo, tradier],
      assetType: [yahoo, tradier],
      liveQuote: [tradier],
      directQuote: [yahoo],
      optionQuote: [tradier],
    },
    { timeoutMs: config.providers.timeoutMs }
  );
}
