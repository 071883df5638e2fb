/**
 * Binance REST Client
 * Spot and USDⓈ-M futures quotes, funding rates, and signed market orders
 */

import axios, { AxiosAdapter, AxiosInstance, isAxiosError } from 'axios';
import crypto from 'crypto';
import { ExchangeCredentials } from '../config.js';
import { logger } from '../logger.js';
import {
    MarketDataPort,
    MarketType,
    OrderExecutionPort,
    OrderResponse,
    OrderResult,
    OrderSide,
    PremiumIndexResponse,
    TickerPriceResponse,
} from './types.js';

export interface BinanceClientOptions {
    spotHost: string;
    futuresHost: string;
    quoteAsset: string;
    timeoutMs: number;
    recvWindowMs: number;
    credentials?: ExchangeCredentials | null;
    adapter?: AxiosAdapter;
}

export class ExchangeError extends Error {
    readonly endpoint: string;
    readonly status: number | undefined;

    constructor(message: string, endpoint: string, status?: number) {
        super(message);
        this.name = 'ExchangeError';
        this.endpoint = endpoint;
        this.status = status;
    }
}

const ORDER_PATH: Record<MarketType, string> = {
    spot: '/api/v3/order',
    futures: '/fapi/v1/order',
};

/**
 * Plain decimal with up to 8 places; the API rejects exponent notation like "1e-7"
 */
export function formatQuantity(quantity: number): string {
    return quantity.toFixed(8).replace(/\.?0+$/, '');
}

export class BinanceClient implements MarketDataPort, OrderExecutionPort {
    private spotClient: AxiosInstance;
    private futuresClient: AxiosInstance;
    private quoteAsset: string;
    private recvWindowMs: number;
    private credentials: ExchangeCredentials | null;

    constructor(options: BinanceClientOptions) {
        this.spotClient = axios.create({
            baseURL: options.spotHost,
            timeout: options.timeoutMs,
            adapter: options.adapter,
        });
        this.futuresClient = axios.create({
            baseURL: options.futuresHost,
            timeout: options.timeoutMs,
            adapter: options.adapter,
        });
        this.quoteAsset = options.quoteAsset;
        this.recvWindowMs = options.recvWindowMs;
        this.credentials = options.credentials ?? null;
    }

    hasCredentials(): boolean {
        return this.credentials !== null;
    }

    /**
     * BTC -> BTCUSDT
     */
    toPair(symbol: string): string {
        return `${symbol.toUpperCase()}${this.quoteAsset}`;
    }

    async getSpotPrice(symbol: string): Promise<number> {
        const endpoint = '/api/v3/ticker/price';
        const data = await this.get<TickerPriceResponse>(this.spotClient, endpoint, { symbol: this.toPair(symbol) });
        return this.parsePrice(data.price, endpoint);
    }

    async getFuturesPrice(symbol: string): Promise<number> {
        const endpoint = '/fapi/v1/ticker/price';
        const data = await this.get<TickerPriceResponse>(this.futuresClient, endpoint, { symbol: this.toPair(symbol) });
        return this.parsePrice(data.price, endpoint);
    }

    /**
     * Last funding rate in percent (the API reports a fraction)
     */
    async getFundingRate(symbol: string): Promise<number> {
        const endpoint = '/fapi/v1/premiumIndex';
        const data = await this.get<PremiumIndexResponse>(this.futuresClient, endpoint, { symbol: this.toPair(symbol) });
        const rate = parseFloat(data.lastFundingRate);
        if (!Number.isFinite(rate)) {
            throw new ExchangeError(`Invalid funding rate: ${data.lastFundingRate}`, endpoint);
        }
        return rate * 100;
    }

    async submitMarketOrder(
        market: MarketType,
        symbol: string,
        side: OrderSide,
        quantity: number
    ): Promise<OrderResult> {
        const endpoint = ORDER_PATH[market];
        if (!this.credentials) {
            throw new ExchangeError('API credentials required to place orders', endpoint);
        }

        const query = this.signQuery({
            symbol: this.toPair(symbol),
            side,
            type: 'MARKET',
            quantity: formatQuantity(quantity),
            recvWindow: String(this.recvWindowMs),
            timestamp: String(Date.now()),
        }, this.credentials.apiSecret);

        const client = market === 'spot' ? this.spotClient : this.futuresClient;

        logger.debug(`Submitting ${market} market order`, { symbol, side, quantity });

        try {
            const response = await client.post<OrderResponse>(`${endpoint}?${query}`, null, {
                headers: { 'X-MBX-APIKEY': this.credentials.apiKey },
            });
            return {
                orderId: String(response.data.orderId),
                market,
                symbol,
                side,
                quantity,
                status: response.data.status,
            };
        } catch (error) {
            throw this.wrapError(error, endpoint);
        }
    }

    /**
     * URL-encode params and append the HMAC-SHA256 signature of the encoded string
     */
    signQuery(params: Record<string, string>, secret: string): string {
        const query = new URLSearchParams(params).toString();
        const signature = crypto.createHmac('sha256', secret).update(query).digest('hex');
        return `${query}&signature=${signature}`;
    }

    private async get<T>(client: AxiosInstance, endpoint: string, params: Record<string, string>): Promise<T> {
        try {
            const response = await client.get<T>(endpoint, { params });
            return response.data;
        } catch (error) {
            throw this.wrapError(error, endpoint);
        }
    }

    private parsePrice(raw: string, endpoint: string): number {
        const price = parseFloat(raw);
        if (!Number.isFinite(price) || price <= 0) {
            throw new ExchangeError(`Invalid price: ${raw}`, endpoint);
        }
        return price;
    }

    private wrapError(error: unknown, endpoint: string): ExchangeError {
        if (isAxiosError(error)) {
            const body: unknown = error.response?.data;
            const detail = typeof body === 'object' && body !== null && 'msg' in body ? ` (${String(body.msg)})` : '';
            return new ExchangeError(`${error.message}${detail}`, endpoint, error.response?.status);
        }
        return new ExchangeError((error as Error).message, endpoint);
    }
}
