import type { Market, MarketInfo } from '../../src/types/scoring';
import type { MarketSettings } from '../../config/strategyConfig';
import { AnalysisRequestError } from './errors';

const CN_PATTERN = /^\d{6}$/;
const HK_PATTERN = /^(?:HK)?(\d{1,5})$/;
const US_PATTERN = /^[A-Z]{1,5}(?:\.[A-Z])?$/;

export interface ResolvedSymbol {
    symbol: string;
    market: Market;
}

/** Infers the market from the symbol shape. 6 digits is CN, up to 5 digits is HK. */
export const detectMarket = (raw: string): Market | null => {
    const symbol = raw.trim().toUpperCase();
    if (CN_PATTERN.test(symbol)) return 'CN';
    if (HK_PATTERN.test(symbol)) return 'HK';
    if (US_PATTERN.test(symbol)) return 'US';
    return null;
};

export const normalizeSymbol = (raw: string, market: Market): string | null => {
    const symbol = raw.trim().toUpperCase();
    switch (market) {
        case 'CN':
            return CN_PATTERN.test(symbol) ? symbol : null;
        case 'HK': {
            const match = HK_PATTERN.exec(symbol);
            return match ? match[1].padStart(5, '0') : null;
        }
        case 'US':
            return US_PATTERN.test(symbol) ? symbol : null;
    }
};

/**
 * Validates a request symbol against the enabled markets.
 * Throws AnalysisRequestError (INVALID_SYMBOL / MARKET_DISABLED).
 */
export const resolveSymbol = (
    raw: string,
    market: Market | undefined,
    markets: Record<Market, MarketSettings>
): ResolvedSymbol => {
    const target = market ?? detectMarket(raw);
    if (!target) {
        throw new AnalysisRequestError('INVALID_SYMBOL', `Cannot determine market for symbol "${raw}"`);
    }
    const symbol = normalizeSymbol(raw, target);
    if (!symbol) {
        throw new AnalysisRequestError('INVALID_SYMBOL', `"${raw}" is not a valid ${target} symbol`);
    }
    if (!markets[target].enabled) {
        throw new AnalysisRequestError('MARKET_DISABLED', `Market ${target} is disabled`);
    }
    return { symbol, market: target };
};

export const isMarket = (value: unknown): value is Market =>
    value === 'CN' || value === 'HK' || value === 'US';

export const getMarketInfo = (market: Market, markets: Record<Market, MarketSettings>): MarketInfo => {
    const { name, currency, timezone, tradingHours } = markets[market];
    return { market, name, currency, timezone, tradingHours };
};
