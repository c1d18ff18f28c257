/**
 * HTTP API Server
 *
 * JSON endpoints over Node's native `http` module. Every request gets its own
 * AbortController; a client that hangs up aborts that request's provider
 * calls and nothing else.
 */

import http from 'node:http';
import { z } from 'zod';
import { createLogger } from './utils/logger.js';
import {
  CoreError,
  InvalidInputError,
  NotFoundError,
  RequestCancelledError,
  StrategyValidationError,
  UnmappedInstrumentError,
  errorMessage,
} from './utils/errors.js';
import { BROKERS, isBrokerId } from './registry/symbols.js';
import type { BrokerId } from './registry/symbols.js';
import type { CoreService } from './service.js';

const log = createLogger('HTTP');

const AllocationBodySchema = z.object({
  totalCapital: z.number(),
  allocationPercent: z.number(),
  broker: z.string(),
  strategyId: z.string().optional(),
  version: z.number().int().positive().optional(),
});

type AllocationBody = z.infer<typeof AllocationBodySchema>;

function json(res: http.ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
  });
  res.end(JSON.stringify(data));
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString()));
    req.on('error', reject);
  });
}

async function readJson<T>(req: http.IncomingMessage, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const raw = await readBody(req);
  let payload: unknown;
  try {
    payload = raw.trim() === '' ? {} : JSON.parse(raw);
  } catch {
    throw new InvalidInputError('body', 'Request body is not valid JSON');
  }
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') || 'body' : 'body';
    throw new InvalidInputError(field, issue ? `${field}: ${issue.message}` : 'Invalid request body');
  }
  return parsed.data;
}

function pathParam(field: string, raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new InvalidInputError(field, `${field} is not a valid path segment: '${raw}'`);
  }
}

function brokerParam(value: string | null | undefined): BrokerId {
  if (!value || !isBrokerId(value)) {
    throw new NotFoundError(`Unknown broker '${value ?? ''}', expected one of ${BROKERS.join(', ')}`);
  }
  return value;
}

export function statusFor(error: unknown): number {
  if (error instanceof InvalidInputError || error instanceof StrategyValidationError) return 400;
  if (error instanceof NotFoundError || error instanceof UnmappedInstrumentError) return 404;
  if (error instanceof RequestCancelledError) return 499;
  return 500;
}

function allocateParams(body: AllocationBody, signal: AbortSignal) {
  return {
    totalCapital: body.totalCapital,
    allocationPercent: body.allocationPercent,
    broker: brokerParam(body.broker),
    strategyId: body.strategyId,
    version: body.version,
    signal,
  };
}

export function createServer(service: CoreService): http.Server {
  return http.createServer(async (req, res) => {
    const url = new URL(req.url || '/', 'http://localhost');
    const pathname = url.pathname;
    const method = req.method || 'GET';

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });
    const signal = controller.signal;

    try {
      if (pathname === '/api/health' && method === 'GET') {
        json(res, { ok: true, brokers: BROKERS.map(b => service.connectionStatus(b)) });
        return;
      }

      const priceMatch = pathname.match(/^\/api\/prices\/([^/]+)$/);
      if (priceMatch && method === 'GET') {
        const broker = url.searchParams.get('broker');
        const snapshot = await service.priceOf(
          pathParam('ticker', priceMatch[1]),
          broker ? brokerParam(broker) : undefined,
          signal
        );
        json(res, snapshot);
        return;
      }

      if (pathname === '/api/strategies' && method === 'GET') {
        json(res, { strategies: service.listStrategies() });
        return;
      }

      if (pathname === '/api/strategies/reload' && method === 'POST') {
        const report = service.reloadStrategies();
        json(res, { ok: report.rejected.length === 0, ...report, strategies: service.listStrategies() });
        return;
      }

      const strategyMatch = pathname.match(/^\/api\/strategies\/([^/]+)$/);
      if (strategyMatch && method === 'GET') {
        const version = url.searchParams.get('version');
        const parsedVersion = version === null ? undefined : Number(version);
        if (parsedVersion !== undefined && !Number.isInteger(parsedVersion)) {
          throw new InvalidInputError('version', `version must be an integer, got '${version}'`);
        }
        json(res, service.strategySummary(pathParam('strategyId', strategyMatch[1]), parsedVersion));
        return;
      }

      if (pathname === '/api/allocations' && method === 'POST') {
        const body = await readJson(req, AllocationBodySchema);
        json(res, await service.allocate(allocateParams(body, signal)));
        return;
      }

      if (pathname === '/api/executions' && method === 'POST') {
        const body = await readJson(req, AllocationBodySchema);
        json(res, await service.allocateAndExecute(allocateParams(body, signal)), 201);
        return;
      }

      const connectionMatch = pathname.match(/^\/api\/connections\/([^/]+)(?:\/(connect|health))?$/);
      if (connectionMatch) {
        const broker = brokerParam(connectionMatch[1]);
        const action = connectionMatch[2];

        if (!action && method === 'GET') {
          json(res, service.connectionStatus(broker));
          return;
        }
        if (action === 'connect' && method === 'POST') {
          json(res, await service.connect(broker, signal));
          return;
        }
        if (action === 'health' && method === 'POST') {
          const healthy = await service.healthCheck(broker, signal);
          json(res, { healthy, state: service.connectionStatus(broker) });
          return;
        }
      }

      json(res, { error: 'Not Found', code: 'NOT_FOUND' }, 404);
    } catch (err) {
      const status = statusFor(err);
      const code = err instanceof CoreError ? err.code : 'INTERNAL';
      if (status >= 500) log.error('Request error', { method, path: pathname, msg: errorMessage(err) });
      else log.debug('Request rejected', { method, path: pathname, status, code });
      if (!res.headersSent && !res.destroyed) json(res, { error: errorMessage(err), code }, status);
    }
  });
}

export function startServer(service: CoreService, port: number): http.Server {
  const server = createServer(service);
  server.listen(port, () => {
    log.info(`API listening on http://localhost:${port}`);
  });
  return server;
}
