/**
 * Exchange Types
 * Narrow capability interfaces the bot depends on, plus the wire shapes of the REST adapter
 */

export type MarketType = 'spot' | 'futures';
export type OrderSide = 'BUY' | 'SELL';

export interface OrderResult {
    orderId: string;
    market: MarketType;
    symbol: string;
    side: OrderSide;
    quantity: number;
    status: string;
}

/**
 * Source of live quotes. Every call may reject independently.
 */
export interface MarketDataPort {
    getSpotPrice(symbol: string): Promise<number>;
    getFuturesPrice(symbol: string): Promise<number>;
    /** Funding rate in percent */
    getFundingRate(symbol: string): Promise<number>;
}

export interface OrderExecutionPort {
    submitMarketOrder(
        market: MarketType,
        symbol: string,
        side: OrderSide,
        quantity: number
    ): Promise<OrderResult>;
}

// Raw REST payloads
export interface TickerPriceResponse {
    symbol: string;
    price: string;
}

export interface PremiumIndexResponse {
    symbol: string;
    markPrice: string;
    indexPrice: string;
    lastFundingRate: string;
    nextFundingTime: number;
    time: number;
}

export interface OrderResponse {
    orderId: number;
    symbol: string;
    status: string;
    executedQty?: string;
}
