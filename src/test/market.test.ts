import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '../../config/strategyConfig';
import { detectMarket, getMarketInfo, normalizeSymbol, resolveSymbol } from '../../services/utils/market';
import { AnalysisRequestError } from '../../services/utils/errors';

const markets = DEFAULT_CONFIG.markets;

describe('Market detection', () => {
    it('should infer the market from the symbol shape', () => {
        expect(detectMarket('600519')).toBe('CN');
        expect(detectMarket('0700')).toBe('HK');
        expect(detectMarket('hk09988')).toBe('HK');
        expect(detectMarket(' aapl ')).toBe('US');
        expect(detectMarket('BRK.B')).toBe('US');
        expect(detectMarket('1234567')).toBeNull();
        expect(detectMarket('TOOLONG')).toBeNull();
    });

    it('should pad Hong Kong codes to five digits', () => {
        expect(normalizeSymbol('700', 'HK')).toBe('00700');
        expect(normalizeSymbol('HK9988', 'HK')).toBe('09988');
        expect(normalizeSymbol('AAPL', 'HK')).toBeNull();
    });
});

describe('resolveSymbol', () => {
    it('should normalise and keep an explicit market', () => {
        expect(resolveSymbol('msft', undefined, markets)).toEqual({ symbol: 'MSFT', market: 'US' });
        expect(resolveSymbol('700', 'HK', markets)).toEqual({ symbol: '00700', market: 'HK' });
    });

    it('should reject a symbol that does not fit the market', () => {
        expect(() => resolveSymbol('AAPL', 'CN', markets)).toThrow('"AAPL" is not a valid CN symbol');
        expect(() => resolveSymbol('???', undefined, markets)).toThrow(AnalysisRequestError);
    });

    it('should reject a disabled market', () => {
        const disabled = { ...markets, CN: { ...markets.CN, enabled: false } };
        try {
            resolveSymbol('600519', undefined, disabled);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(AnalysisRequestError);
            expect(error).toMatchObject({ code: 'MARKET_DISABLED' });
        }
    });

    it('should describe the market', () => {
        expect(getMarketInfo('HK', markets)).toEqual({
            market: 'HK',
            name: 'Hong Kong',
            currency: 'HKD',
            timezone: 'Asia/Hong_Kong',
            tradingHours: '09:30-16:00',
        });
    });
});
