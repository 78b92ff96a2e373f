import { z } from 'zod';
import { Decimal } from '../core/decimal.js';
import { parseTradingPair } from '../core/tradingPair.js';

const parseBoolean = (v: unknown, fallback: boolean): boolean => {
  if (typeof v !== 'string') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v.toLowerCase());
};

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

type DecimalBound = 'positive' | 'nonNegative' | 'any';

const decimalEnv = (fallback: string, bound: DecimalBound = 'nonNegative') =>
  z
    .string()
    .default(fallback)
    .transform((v, ctx) => {
      let value: Decimal;
      try {
        value = Decimal.parse(v);
      } catch (err) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(err) });
        return z.NEVER;
      }
      if (bound === 'positive' && !value.isPositive()) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be > 0, got ${v}` });
        return z.NEVER;
      }
      if (bound === 'nonNegative' && value.isNegative()) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be >= 0, got ${v}` });
        return z.NEVER;
      }
      return value;
    });

/** "ETH:1,USDT:2000" */
const balancesEnv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v, ctx) => {
      const balances = new Map<string, Decimal>();
      for (const entry of v.split(',').map((s) => s.trim()).filter(Boolean)) {
        const [asset, amount] = entry.split(':').map((s) => s.trim());
        if (!asset || !amount) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `malformed balance entry "${entry}"` });
          return z.NEVER;
        }
        try {
          balances.set(asset.toUpperCase(), Decimal.parse(amount));
        } catch (err) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${asset}: ${errorMessage(err)}` });
          return z.NEVER;
        }
      }
      return balances;
    });

const tradingPairEnv = z
  .string()
  .default('ETH-USDT')
  .transform((v, ctx) => {
    try {
      const { base, quote } = parseTradingPair(v);
      return `${base}-${quote}`;
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(err) });
      return z.NEVER;
    }
  });

export const exchangeIds = ['binance', 'bybit', 'okx', 'kucoin'] as const;

const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  HTTP_PORT: z.coerce.number().int().positive().default(8080),

  MODE: z.enum(['paper', 'live']).default('paper'),
  ALLOW_LIVE_TRADING: z.string().optional(),
  EXCHANGE: z.enum(exchangeIds).default('binance'),
  EXCHANGE_API_KEY: z.string().optional(),
  EXCHANGE_API_SECRET: z.string().optional(),

  TRADING_PAIR: tradingPairEnv,
  ORDER_AMOUNT: decimalEnv('0.01', 'positive'),
  ORDER_REFRESH_SECONDS: z.coerce.number().positive().default(15),
  TICK_INTERVAL_MS: z.coerce.number().int().positive().default(1000),

  CANDLES_EXCHANGE: z.enum(exchangeIds).default('binance'),
  CANDLES_INTERVAL: z.string().default('1m'),
  CANDLES_MAX_RECORDS: z.coerce.number().int().positive().default(1000),
  CANDLES_POLL_MS: z.coerce.number().int().positive().default(10_000),

  NATR_LENGTH: z.coerce.number().int().positive().default(30),
  MACD_FAST: z.coerce.number().int().positive().default(12),
  MACD_SLOW: z.coerce.number().int().positive().default(26),
  MACD_SIGNAL: z.coerce.number().int().positive().default(9),

  BID_NATR_SCALAR: decimalEnv('0.012'),
  ASK_NATR_SCALAR: decimalEnv('0.006'),
  MACD_WEIGHT: decimalEnv('0.5'),
  INVENTORY_PHI: decimalEnv('0.01'),
  MAX_INVENTORY: decimalEnv('1', 'positive'),
  MIN_SPREAD: decimalEnv('0.00001', 'positive'),

  PAPER_BALANCES: balancesEnv('ETH:1,USDT:2000'),
  STATUS_LOG_INTERVAL_MS: z.coerce.number().int().positive().default(60_000)
});

export const configSchema = rawSchema
  .transform((raw) => {
    const maxRecords = raw.CANDLES_MAX_RECORDS;

    return Object.freeze({
      nodeEnv: raw.NODE_ENV,
      logLevel: raw.LOG_LEVEL,
      httpPort: raw.HTTP_PORT,

      mode: raw.MODE,
      allowLiveTrading: parseBoolean(raw.ALLOW_LIVE_TRADING, false),
      exchange: Object.freeze({
        id: raw.EXCHANGE,
        apiKey: raw.EXCHANGE_API_KEY,
        apiSecret: raw.EXCHANGE_API_SECRET
      }),

      trading: Object.freeze({
        symbol: raw.TRADING_PAIR,
        orderAmount: raw.ORDER_AMOUNT,
        refreshIntervalMs: Math.round(raw.ORDER_REFRESH_SECONDS * 1000),
        tickIntervalMs: raw.TICK_INTERVAL_MS
      }),

      candles: Object.freeze({
        exchange: raw.CANDLES_EXCHANGE,
        interval: raw.CANDLES_INTERVAL,
        maxRecords,
        pollIntervalMs: raw.CANDLES_POLL_MS
      }),

      indicators: Object.freeze({
        natrLength: raw.NATR_LENGTH,
        macdFast: raw.MACD_FAST,
        macdSlow: raw.MACD_SLOW,
        macdSignal: raw.MACD_SIGNAL
      }),

      spreads: Object.freeze({
        bidNatrScalar: raw.BID_NATR_SCALAR,
        askNatrScalar: raw.ASK_NATR_SCALAR,
        macdWeight: raw.MACD_WEIGHT,
        inventoryPhi: raw.INVENTORY_PHI,
        maxInventory: raw.MAX_INVENTORY,
        minSpread: raw.MIN_SPREAD
      }),

      paper: Object.freeze({
        balances: raw.PAPER_BALANCES
      }),

      statusLogIntervalMs: raw.STATUS_LOG_INTERVAL_MS
    });
  })
  .superRefine((cfg, ctx) => {
    const { macdFast, macdSlow, macdSignal, natrLength } = cfg.indicators;
    if (macdFast >= macdSlow) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MACD_FAST'],
        message: `must be lower than MACD_SLOW (${macdFast} >= ${macdSlow})`
      });
    }
    const required = Math.max(natrLength, macdSlow + macdSignal);
    if (cfg.candles.maxRecords < required) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CANDLES_MAX_RECORDS'],
        message: `must hold at least ${required} candles for the configured indicators`
      });
    }
    if (cfg.mode === 'live' && (!cfg.exchange.apiKey || !cfg.exchange.apiSecret)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['EXCHANGE_API_KEY'],
        message: 'live mode requires EXCHANGE_API_KEY and EXCHANGE_API_SECRET'
      });
    }
  });
