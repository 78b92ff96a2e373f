import type { z } from 'zod';
import type { configSchema } from './schema.js';

export type AppConfig = z.infer<typeof configSchema>;
export type IndicatorSettings = AppConfig['indicators'];
export type SpreadSettings = AppConfig['spreads'];
export type TradingSettings = AppConfig['trading'];
