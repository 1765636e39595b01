/**
 * Position pricing
 *
 * Marks one option position to market. The option price is looked up in
 * three steps: a live quote by OCC symbol, then the matching row of the
 * options chain, then a Black-Scholes value with historical volatility
 * standing in for IV.
 */

import type { OptionsConfig, PortfolioConfig, TechnicalConfig } from '@/core/config';
import { daysUntil } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import { blackScholes } from '@/analysis/greeks';
import { historicalVolatility } from '@/analysis/technical';
import type { DataSourceRouter } from '@/providers/router';
import type { OptionType, ProviderGreeks } from '@/types/market';
import type {
  Position,
  PositionSnapshot,
  PricePreference,
  PricingConfidence,
  PricingSource,
} from '@/types/portfolio';
import { costBasis, marketValue, positionContractSymbol, unrealizedPnl } from './models';

const logger = createChildLogger('pricing');

const STRIKE_TOLERANCE = 0.01;
const MIN_YEARS = 0.01;

export interface PricerConfig {
  portfolio: Pick<PortfolioConfig, 'pricePreference'>;
  options: Pick<OptionsConfig, 'riskFreeRate'>;
  technical: Pick<TechnicalConfig, 'hvWindow'>;
}

interface OptionMark {
  bid: number | null;
  ask: number | null;
  last: number | null;
  iv: number | null;
  greeks: ProviderGreeks | null;
  source: PricingSource;
}

function positive(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

export function midPrice(bid: number | null, ask: number | null): number | null {
  return positive(bid) && positive(ask) ? (bid + ask) / 2 : null;
}

/** MID falls back to last when either side of the quote is missing. */
export function selectPrice(
  preference: PricePreference,
  quote: { bid: number | null; ask: number | null; last: number | null }
): number | null {
  switch (preference) {
    case 'BID':
      return positive(quote.bid) ? quote.bid : null;
    case 'ASK':
      return positive(quote.ask) ? quote.ask : null;
    case 'MID':
      return midPrice(quote.bid, quote.ask) ?? (positive(quote.last) ? quote.last : null);
  }
}

function completeGreeks(greeks: ProviderGreeks | null): boolean {
  return (
    greeks !== null &&
    greeks.delta !== null &&
    greeks.gamma !== null &&
    greeks.theta !== null &&
    greeks.vega !== null
  );
}

export class PositionPricer {
  constructor(
    private readonly router: DataSourceRouter,
    private readonly config: PricerConfig
  ) {}

  async price(position: Position, now: Date = new Date()): Promise<PositionSnapshot> {
    const basis = costBasis(position.entryPrice, position.contracts);
    const daysToExpiry = daysUntil(position.expiry, now);
    const lastUpdated = now.toISOString();

    const underlying = await this.router.livePrice(position.symbol);
    if (underlying.price === null) {
      logger.warn({ symbol: position.symbol, positionId: position.id }, 'Underlying price unavailable');
      return {
        underlyingLast: null,
        optionBid: null,
        optionAsk: null,
        optionLast: null,
        optionMid: null,
        markPrice: null,
        delta: null,
        gamma: null,
        theta: null,
        vega: null,
        iv: null,
        daysToExpiry,
        costBasis: basis,
        marketValue: null,
        unrealizedPnl: null,
        unrealizedPnlPct: null,
        pricingSource: 'unavailable',
        underlyingSource: underlying.source,
        pricingConfidence: 'LOW',
        lastUpdated,
      };
    }

    const spot = underlying.price;
    const years = Math.max((daysToExpiry ?? 0) / 365, MIN_YEARS);

    let mark = await this.fromLiveQuote(position);
    mark ??= await this.fromChain(position, spot, years);

    let markPrice: number | null;
    let confidence: PricingConfidence;
    let greeks: ProviderGreeks | null;
    let iv: number | null;
    let source: PricingSource;

    if (mark) {
      markPrice = selectPrice(this.config.portfolio.pricePreference, mark);
      iv = mark.iv;
      greeks = completeGreeks(mark.greeks) ? mark.greeks : this.modelGreeks(position.optionType, spot, position.strike, years, iv);
      confidence = positive(iv) ? 'HIGH' : 'MEDIUM';
      source = mark.source;
    } else {
      const hv = await this.historicalVol(position.symbol);
      const model = hv === null
        ? null
        : blackScholes({
            type: position.optionType,
            spot,
            strike: position.strike,
            years,
            rate: this.config.options.riskFreeRate,
            sigma: hv,
          });
      if (model) {
        logger.info({ symbol: position.symbol, hv }, 'Using Black-Scholes fallback price');
        markPrice = model.price;
        greeks = { delta: model.delta, gamma: model.gamma, theta: model.theta, vega: model.vega };
        iv = hv;
        confidence = 'MEDIUM';
        source = 'black_scholes';
      } else {
        markPrice = null;
        greeks = null;
        iv = null;
        confidence = 'LOW';
        source = 'unavailable';
      }
    }

    const value = marketValue(markPrice, position.contracts);
    const { pnl, pnlPct } = unrealizedPnl(value, basis);

    return {
      underlyingLast: spot,
      optionBid: mark?.bid ?? null,
      optionAsk: mark?.ask ?? null,
      optionLast: mark?.last ?? null,
      optionMid: mark ? midPrice(mark.bid, mark.ask) : null,
      markPrice,
      delta: greeks?.delta ?? null,
      gamma: greeks?.gamma ?? null,
      theta: greeks?.theta ?? null,
      vega: greeks?.vega ?? null,
      iv,
      daysToExpiry,
      costBasis: basis,
      marketValue: value,
      unrealizedPnl: pnl,
      unrealizedPnlPct: pnlPct,
      pricingSource: source,
      underlyingSource: underlying.source,
      pricingConfidence: confidence,
      lastUpdated,
    };
  }

  private async fromLiveQuote(position: Position): Promise<OptionMark | null> {
    const contract = positionContractSymbol(position);
    if (!contract) return null;
    const quote = await this.router.liveOptionQuote(contract);
    if (!quote) return null;
    logger.debug({ contract, source: quote.source }, 'Live option quote');
    return {
      bid: quote.bid,
      ask: quote.ask,
      last: quote.last,
      iv: quote.iv,
      greeks: quote.greeks,
      source: 'live_quote',
    };
  }

  private async fromChain(position: Position, spot: number, years: number): Promise<OptionMark | null> {
    const chain = await this.router.optionsChain(position.symbol, 0);
    const row = chain.find(
      (r) =>
        r.optionType === position.optionType &&
        r.expiration === position.expiry &&
        Math.abs(r.strike - position.strike) <= STRIKE_TOLERANCE
    );
    if (!row) {
      if (chain.length > 0) {
        logger.warn(
          { symbol: position.symbol, expiry: position.expiry, strike: position.strike },
          'No matching contract in options chain'
        );
      }
      return null;
    }

    const greeks = completeGreeks(row.greeks)
      ? row.greeks
      : this.modelGreeks(position.optionType, spot, position.strike, years, row.impliedVolatility);

    return {
      bid: row.bid,
      ask: row.ask,
      last: row.last,
      iv: row.impliedVolatility,
      greeks,
      source: 'chain_lookup',
    };
  }

  private modelGreeks(
    type: OptionType,
    spot: number,
    strike: number,
    years: number,
    iv: number | null
  ): ProviderGreeks | null {
    if (!positive(iv)) return null;
    const model = blackScholes({ type, spot, strike, years, rate: this.config.options.riskFreeRate, sigma: iv });
    return model ? { delta: model.delta, gamma: model.gamma, theta: model.theta, vega: model.vega } : null;
  }

  private async historicalVol(symbol: string): Promise<number | null> {
    const bars = await this.router.ohlcv(symbol, '6mo', '1d');
    const hv = historicalVolatility(
      bars.map((b) => b.close),
      this.config.technical.hvWindow
    );
    return hv !== null && hv > 0 ? hv : null;
  }
}
