import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { readFileSync } from 'fs';
import { join } from 'path';
import type { ActivityRegistry } from '../activities/registry.js';
import type { RegistryResult } from '../activities/types.js';

export interface ServerOptions {
  staticDir: string;
  log?: boolean;
}

const MUTATION_ROUTE = /^\/activities\/([^/]+)\/(signup|unregister)$/;

// --- HTTP helpers ---

function json(res: ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json', 'Access-Control-Allow-Origin': '*' });
  res.end(JSON.stringify(data));
}

function detail(res: ServerResponse, status: number, message: string): void {
  json(res, status, { detail: message });
}

function methodNotAllowed(res: ServerResponse, allow: string): void {
  res.setHeader('Allow', allow);
  detail(res, 405, 'Method Not Allowed');
}

function safeDecode(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
}

export function parseQuery(url: string): Record<string, string> {
  const idx = url.indexOf('?');
  if (idx === -1) return {};
  const params: Record<string, string> = {};
  url.slice(idx + 1).split('&').forEach(p => {
    const eq = p.indexOf('=');
    const rawKey = (eq === -1 ? p : p.slice(0, eq)).replace(/\+/g, ' ');
    const rawValue = (eq === -1 ? '' : p.slice(eq + 1)).replace(/\+/g, ' ');
    const k = safeDecode(rawKey);
    if (k) params[k] = safeDecode(rawValue) ?? rawValue;
  });
  return params;
}

function sendResult(res: ServerResponse, result: RegistryResult): void {
  if (result.ok) {
    json(res, 200, { message: result.message });
  } else {
    detail(res, result.reason === 'not_found' ? 404 : 400, result.error);
  }
}

// --- Server ---

export function createActivitiesServer(registry: ActivityRegistry, options: ServerOptions): Server {
  const log = options.log ?? true;
  const indexHtml = join(options.staticDir, 'index.html');

  function serveHTML(res: ServerResponse): void {
    try {
      const html = readFileSync(indexHtml, 'utf-8');
      res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8', 'Cache-Control': 'no-cache, no-store' });
      res.end(html);
    } catch {
      res.writeHead(404, { 'Content-Type': 'text/plain' });
      res.end('index.html not found - check STATIC_DIR');
    }
  }

  async function handleMutation(req: IncomingMessage, res: ServerResponse, rawName: string, action: string): Promise<void> {
    const expected = action === 'signup' ? 'POST' : 'DELETE';
    if (req.method !== expected) {
      methodNotAllowed(res, expected);
      return;
    }

    const activityName = safeDecode(rawName);
    if (activityName === null) {
      detail(res, 400, 'Malformed activity name');
      return;
    }

    const email = parseQuery(req.url || '').email;
    if (!email) {
      detail(res, 422, 'Missing required query parameter: email');
      return;
    }

    const result = action === 'signup'
      ? await registry.signup(activityName, email)
      : await registry.unregister(activityName, email);
    sendResult(res, result);
  }

  return createServer(async (req, res) => {
    if (req.method === 'OPTIONS') {
      res.writeHead(204, {
        'Access-Control-Allow-Origin': '*',
        'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
        'Access-Control-Allow-Headers': 'Content-Type',
      });
      res.end();
      return;
    }

    const url = (req.url || '').split('?')[0];
    const mutation = MUTATION_ROUTE.exec(url);

    try {
      if (url === '/') {
        if (req.method === 'GET') serveHTML(res);
        else methodNotAllowed(res, 'GET');
      } else if (url === '/activities') {
        if (req.method === 'GET') json(res, 200, registry.listActivities());
        else methodNotAllowed(res, 'GET');
      } else if (url === '/health') {
        if (req.method === 'GET') json(res, 200, { status: 'ok', activities: registry.size });
        else methodNotAllowed(res, 'GET');
      } else if (mutation) {
        await handleMutation(req, res, mutation[1], mutation[2]);
      } else {
        detail(res, 404, 'Not Found');
      }
    } catch (err) {
      if (log) console.error('[Server] Request error:', err);
      if (!res.headersSent) detail(res, 500, 'Internal Server Error');
      else res.end();
    }
  });
}
