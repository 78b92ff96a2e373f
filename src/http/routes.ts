/**
 * Status HTTP routes.
 *
 * Handlers are pure functions over a context of pre-built runtime modules and
 * return a response value; `createRequestHandler` adapts them to node:http.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { AppConfig } from '../config/types.js';
import type { Logger } from '../core/logger.js';
import type { InMemoryMetrics } from '../core/metrics.js';
import type { PrometheusMetrics } from '../core/prometheusMetrics.js';
import type { TradingConnector } from '../execution/connector.js';
import type { TradingLoops } from '../jobs/loops.js';
import type { MarketMakingStrategy } from '../strategy/engine.js';

// ── Route context ────────────────────────────────────────────────────────────

export interface RouteContext {
  config: AppConfig;
  logger: Logger;
  metrics: PrometheusMetrics | InMemoryMetrics;
  loops: TradingLoops;
  strategy: MarketMakingStrategy;
  connector: TradingConnector;
  startedAt: number;
  now?: () => number;
}

export interface HttpResponse {
  status: number;
  contentType: string;
  body: string;
}

type Handler = (ctx: RouteContext) => HttpResponse;

interface Route {
  method: 'GET';
  path: string;
  handler: Handler;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

const json = (data: unknown, status = 200): HttpResponse => ({
  status,
  contentType: 'application/json',
  body: JSON.stringify(data)
});

// ── Routes ───────────────────────────────────────────────────────────────────

const routes: Route[] = [
  {
    method: 'GET',
    path: '/health',
    handler: (ctx) =>
      json({
        ok: true,
        mode: ctx.config.mode,
        exchange: ctx.config.exchange.id,
        connectorReady: ctx.connector.isReady(),
        uptime: Math.floor(((ctx.now ?? Date.now)() - ctx.startedAt) / 1000)
      })
  },
  {
    method: 'GET',
    path: '/status',
    handler: (ctx) => {
      const status = ctx.loops.getStatus();
      const metrics = ctx.strategy.getStatusMetrics();
      return json({
        symbol: ctx.config.trading.symbol,
        connector: ctx.connector.name,
        summary: ctx.strategy.formatStatus(),
        bidSpread: metrics.bidSpread,
        askSpread: metrics.askSpread,
        invNorm: metrics.invNorm,
        lastCandleTime: status.lastCandleTime ?? null,
        lastTickAt: status.lastTickAt ?? null,
        lastOutcome: status.lastOutcome ?? null,
        nextTickAt: status.nextTickAt ?? null,
        cycles: status.cycles,
        failedCycles: status.failedCycles
      });
    }
  },
  {
    method: 'GET',
    path: '/metrics',
    handler: (ctx) => {
      if ('render' in ctx.metrics) {
        return { status: 200, contentType: 'text/plain; version=0.0.4', body: ctx.metrics.render() };
      }
      return json(ctx.metrics.snapshot());
    }
  }
];

export const handleRoute = (method: string, url: string, ctx: RouteContext): HttpResponse => {
  const pathname = url.split('?')[0] ?? '';
  const route = routes.find((r) => r.path === pathname);
  if (!route) return json({ error: 'not_found', path: pathname }, 404);
  if (route.method !== method) return json({ error: 'method_not_allowed' }, 405);
  return route.handler(ctx);
};

export const createRequestHandler =
  (ctx: RouteContext) =>
  (req: IncomingMessage, res: ServerResponse): void => {
    if (!req.url || !req.method) {
      res.statusCode = 400;
      res.end('Bad request');
      return;
    }
    try {
      const response = handleRoute(req.method, req.url, ctx);
      res.writeHead(response.status, { 'Content-Type': response.contentType });
      res.end(response.body);
    } catch (err) {
      ctx.logger.error('http handler failed', { url: req.url, err: String(err) });
      res.writeHead(500, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'internal_error' }));
    }
  };
