/**
 * Snapshot API Server
 * Read-only HTTP API over the current snapshot and the match-report ledger.
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { URL } from 'url';
import { config } from './config.js';
import { loadLocaleDb, loadManualLocaleDb, loadOrnaData } from './data/snapshot.js';
import {
  initDatabase,
  closeDatabase,
  checkDatabaseHealth,
  getLedgerStats,
  getRecentRuns,
  getRun,
  getRunMismatches,
} from './database/db.js';
import { translateOrnaData, withManualOverrides } from './translation.js';
import { GUIDE_KINDS, type GuideKind, type LocaleDb, type OrnaData } from './types.js';

const startedAt = new Date().toISOString();

// CORS headers for cross-origin requests
const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
  'Content-Type': 'application/json',
};

/** What the server answers from. Loaded once at startup. */
export interface ApiSnapshot {
  data: OrnaData;
  locales: LocaleDb;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

export function loadApiSnapshot(dir: string = config.data.currentDir): ApiSnapshot {
  return {
    data: loadOrnaData(dir),
    locales: withManualOverrides(loadLocaleDb(dir), loadManualLocaleDb(dir)),
  };
}

function json(body: unknown, status = 200): ApiResponse {
  return { status, body };
}

function error(message: string, status = 400): ApiResponse {
  return { status, body: { error: message } };
}

function parseGuideKind(value: string): GuideKind | undefined {
  return GUIDE_KINDS.find(kind => kind === value);
}

function parsePositiveInt(value: string | null, fallback: number): number | null {
  if (value === null) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 0 ? null : parsed;
}

/**
 * Route one GET request. Pure apart from the ledger reads, so the whole
 * surface can be exercised without a socket.
 */
export function routeRequest(url: URL, snapshot: ApiSnapshot): ApiResponse {
  const path = url.pathname;

  // Health check: verifies DB connectivity
  if (path === '/health' || path === '/api/health') {
    const dbHealth = checkDatabaseHealth();
    const uptimeMs = Date.now() - new Date(startedAt).getTime();
    return json({
      status: dbHealth.ok ? 'ok' : 'degraded',
      service: 'codex-guide-sync',
      uptime: Math.floor(uptimeMs / 1000),
      startedAt,
      database: dbHealth.details,
    }, dbHealth.ok ? 200 : 503);
  }

  if (path === '/api/stats') {
    const { codex, guide } = snapshot.data;
    return json({
      codex: {
        items: codex.items.length,
        monsters: codex.monsters.length,
        bosses: codex.bosses.length,
        raids: codex.raids.length,
        skills: codex.skills.length,
        followers: codex.followers.length,
      },
      guide: {
        items: guide.items.length,
        monsters: guide.monsters.length,
        skills: guide.skills.length,
        pets: guide.pets.length,
      },
      locales: Object.keys(snapshot.locales.locales).sort(),
      ledger: getLedgerStats(),
    });
  }

  if (path === '/api/runs') {
    const limit = parsePositiveInt(url.searchParams.get('limit'), 20);
    if (limit === null) return error('Invalid limit');
    const runs = getRecentRuns(limit);
    return json({ runs, count: runs.length });
  }

  const runMatch = path.match(/^\/api\/runs\/(\d+)\/mismatches$/);
  if (runMatch) {
    const runId = parseInt(runMatch[1], 10);
    const run = getRun(runId);
    if (!run) return error('Run not found', 404);
    const mismatches = getRunMismatches(runId);
    return json({ run, mismatches, count: mismatches.length });
  }

  const entityMatch = path.match(/^\/api\/([a-zA-Z]+)(?:\/(\d+))?$/);
  const kind = entityMatch ? parseGuideKind(entityMatch[1]) : undefined;
  if (entityMatch && kind) {
    let data = snapshot.data;
    const lang = url.searchParams.get('lang');
    if (lang) {
      const strings = snapshot.locales.locales[lang];
      if (!strings) return error(`Unknown locale: ${lang}`, 404);
      data = translateOrnaData(data, strings);
    }
    const entities: { id: number; name: string; tier: number }[] = data.guide[kind];

    if (entityMatch[2] !== undefined) {
      const id = parseInt(entityMatch[2], 10);
      const entity = entities.find(e => e.id === id);
      return entity ? json(entity) : error(`No ${kind} with id ${id}`, 404);
    }

    const tierParam = url.searchParams.get('tier');
    const tier = tierParam === null ? null : parseInt(tierParam, 10);
    if (tier !== null && Number.isNaN(tier)) return error('Invalid tier');
    const q = url.searchParams.get('q');

    const results = entities.filter(e => (tier === null || e.tier === tier) && (q === null || e.name === q));
    return json({ results, count: results.length });
  }

  return error('Not found', 404);
}

function sendJSON(res: ServerResponse, response: ApiResponse): void {
  res.writeHead(response.status, CORS_HEADERS);
  res.end(JSON.stringify(response.body));
}

function handleRequest(snapshot: ApiSnapshot, req: IncomingMessage, res: ServerResponse): void {
  // Handle CORS preflight
  if (req.method === 'OPTIONS') {
    res.writeHead(204, CORS_HEADERS);
    res.end();
    return;
  }

  const url = new URL(req.url || '/', `http://localhost:${config.api.port}`);
  const requestStart = Date.now();
  const isHealthCheck = url.pathname === '/health' || url.pathname === '/api/health';

  try {
    sendJSON(res, req.method === 'GET' ? routeRequest(url, snapshot) : error('Method not allowed', 405));
  } catch (err) {
    console.error('[API] Error:', err);
    sendJSON(res, error('Internal server error', 500));
  } finally {
    if (!isHealthCheck) {
      const elapsed = Date.now() - requestStart;
      console.log(`[API] ${req.method} ${url.pathname} ${res.statusCode} (${elapsed}ms)`);
    }
  }
}

export function startServer(port: number = config.api.port, dir: string = config.data.currentDir): void {
  initDatabase();
  const snapshot = loadApiSnapshot(dir);

  const server = createServer((req, res) => handleRequest(snapshot, req, res));

  server.listen(port, () => {
    console.log('');
    console.log('╔════════════════════════════════════════════════════════════════╗');
    console.log('║                     CODEX-GUIDE-SYNC API                       ║');
    console.log(`║                  Running on port ${port}                          ║`);
    console.log('╚════════════════════════════════════════════════════════════════╝');
    console.log('');
    console.log(`Serving ${dir}`);
    console.log('Endpoints:');
    console.log('  GET /health                        - Health check');
    console.log('  GET /api/stats                     - Snapshot and ledger statistics');
    console.log('  GET /api/{items|monsters|skills|pets} - Guide entities (?tier=, ?q=, ?lang=)');
    console.log('  GET /api/{kind}/:id                - One guide entity');
    console.log('  GET /api/runs                      - Recent match runs (?limit=)');
    console.log('  GET /api/runs/:id/mismatches       - Mismatches of one run');
    console.log('');
  });

  // Graceful shutdown (SIGINT for terminal, SIGTERM for Docker)
  const shutdown = (signal: string) => {
    console.log(`\n[API] Shutting down (${signal})...`);
    server.close(() => {
      closeDatabase();
      console.log('[API] Shutdown complete');
      process.exit(0);
    });
    // Force exit after 10s if connections are hanging
    setTimeout(() => {
      console.error('[API] Forced shutdown after timeout');
      process.exit(1);
    }, 10000);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  process.on('uncaughtException', (err) => {
    console.error('[API] UNCAUGHT EXCEPTION:', err);
    shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    console.error('[API] UNHANDLED REJECTION:', reason);
  });
}

// Run if called directly
if (process.argv[1]?.endsWith('api.js') || process.argv[1]?.endsWith('api.ts')) {
  startServer();
}
