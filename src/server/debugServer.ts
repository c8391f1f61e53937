/**
 * Debug Server - HTTP + WebSocket server for stepping programs
 *
 * Exposes interpreter sessions through:
 * - REST API for session management, stepping, input and inspection
 * - WebSocket for real-time state updates during execution
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { createServer } from 'http';
import type {
  IDebugService,
  SessionConfig,
  SessionSummary,
  MachineSnapshot,
  StepResult,
  Breakpoint,
  BreakpointSpec,
  LoadResult,
  ServerEvent,
  ClientCommand,
} from './debugService';
import { DebugSession } from './debugSession';

// ============================================================
// REQUEST PARSING
// ============================================================

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bodyOf(req: Request): Json {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw new Error(`${field} must be a string`);
  return value;
}

function parseSessionConfig(body: Json): SessionConfig {
  const config: SessionConfig = {};
  if (typeof body.name === 'string') config.name = body.name;
  if (typeof body.tapeSize === 'number') config.tapeSize = body.tapeSize;
  if (body.eofBehavior === 'zero' || body.eofBehavior === 'decrement' || body.eofBehavior === 'unchanged') {
    config.eofBehavior = body.eofBehavior;
  }
  if (typeof body.debug === 'boolean') config.debug = body.debug;
  if (typeof body.specialOps === 'boolean') config.specialOps = body.specialOps;
  if (typeof body.maxSteps === 'number') config.maxSteps = body.maxSteps;
  return config;
}

export function parseBreakpointSpec(body: Json): BreakpointSpec {
  if (body.type !== 'offset' && body.type !== 'operator') {
    throw new Error(`Unknown breakpoint type: ${String(body.type)}`);
  }
  return {
    type: body.type,
    offset: typeof body.offset === 'number' ? body.offset : undefined,
    operator: typeof body.operator === 'string' ? body.operator : undefined,
    enabled: typeof body.enabled === 'boolean' ? body.enabled : undefined,
  };
}

export function parseClientCommand(raw: string): ClientCommand {
  const data: unknown = JSON.parse(raw);
  if (!isRecord(data)) throw new Error('Command must be a JSON object');

  switch (data.type) {
    case 'load':
      if (typeof data.code !== 'string') throw new Error('load needs code');
      return { type: 'load', code: data.code, input: optionalString(data.input, 'input') };
    case 'step':
      return { type: 'step' };
    case 'stepN':
      if (typeof data.n !== 'number') throw new Error('stepN needs n');
      return { type: 'stepN', n: data.n };
    case 'continue':
      return { type: 'continue' };
    case 'input':
      return {
        type: 'input',
        text: optionalString(data.text, 'text'),
        end: data.end === true,
      };
    case 'addBreakpoint':
      if (!isRecord(data.breakpoint)) throw new Error('addBreakpoint needs breakpoint');
      return { type: 'addBreakpoint', breakpoint: parseBreakpointSpec(data.breakpoint) };
    case 'removeBreakpoint':
      if (typeof data.breakpointId !== 'string') throw new Error('removeBreakpoint needs breakpointId');
      return { type: 'removeBreakpoint', breakpointId: data.breakpointId };
    default:
      throw new Error(`Unknown command: ${String(data.type)}`);
  }
}

// ============================================================
// DEBUG SERVER IMPLEMENTATION
// ============================================================

interface SessionInfo {
  session: DebugSession;
  clients: Set<WebSocket>;
}

export class DebugServer implements IDebugService {
  private app: express.Application;
  private server: ReturnType<typeof createServer>;
  private wss: WebSocketServer;
  private sessions = new Map<string, SessionInfo>();
  private port: number;

  constructor(port = 3456) {
    this.port = port;
    this.app = express();
    this.app.use(express.json());
    this.app.use(this.corsMiddleware);

    this.server = createServer(this.app);
    this.wss = new WebSocketServer({ server: this.server, path: '/ws' });

    this.setupRoutes();
    this.setupWebSocket();
  }

  // ─────────────────────────────────────────────────────────────
  // MIDDLEWARE
  // ─────────────────────────────────────────────────────────────

  private corsMiddleware = (req: Request, res: Response, next: NextFunction) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  };

  // ─────────────────────────────────────────────────────────────
  // HTTP ROUTES
  // ─────────────────────────────────────────────────────────────

  private setupRoutes() {
    const app = this.app;

    app.get('/health', (_req, res) => {
      res.json({ status: 'ok', sessions: this.sessions.size });
    });

    // ─── Session Management ───
    app.post('/session', async (req, res) => {
      try {
        const id = await this.createSession(parseSessionConfig(bodyOf(req)));
        res.json({ id });
      } catch (e) {
        res.status(500).json({ error: errorMessage(e) });
      }
    });

    app.get('/sessions', async (_req, res) => {
      res.json(await this.listSessions());
    });

    app.get('/session/:id', async (req, res) => {
      try {
        res.json(await this.getSession(req.params.id));
      } catch (e) {
        res.status(404).json({ error: errorMessage(e) });
      }
    });

    app.delete('/session/:id', async (req, res) => {
      try {
        await this.closeSession(req.params.id);
        res.json({ success: true });
      } catch (e) {
        res.status(404).json({ error: errorMessage(e) });
      }
    });

    // ─── Code Execution ───
    app.post('/session/:id/load', async (req, res) => {
      try {
        const body = bodyOf(req);
        if (typeof body.code !== 'string') throw new Error('code must be a string');
        const result = await this.loadCode(req.params.id, body.code, optionalString(body.input, 'input'));
        res.json(result);
        this.broadcastSnapshot(req.params.id);
      } catch (e) {
        res.status(400).json({ error: errorMessage(e) });
      }
    });

    app.post('/session/:id/step', async (req, res) => {
      try {
        const result = await this.step(req.params.id);
        res.json(result);
        this.broadcastResult(req.params.id, result);
      } catch (e) {
        res.status(400).json({ error: errorMessage(e) });
      }
    });

    app.post('/session/:id/step/:n', async (req, res) => {
      try {
        const n = parseInt(req.params.n, 10);
        if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid step count: ${req.params.n}`);
        const result = await this.stepN(req.params.id, n);
        res.json(result);
        this.broadcastResult(req.params.id, result);
      } catch (e) {
        res.status(400).json({ error: errorMessage(e) });
      }
    });

    app.post('/session/:id/continue', async (req, res) => {
      try {
        const result = await this.continue(req.params.id);
        res.json(result);
        this.broadcastResult(req.params.id, result);
      } catch (e) {
        res.status(400).json({ error: errorMessage(e) });
      }
    });

    app.post('/session/:id/input', async (req, res) => {
      try {
        const body = bodyOf(req);
        const snapshot = await this.provideInput(
          req.params.id,
          optionalString(body.text, 'text') ?? '',
          body.end === true
        );
        res.json(snapshot);
        this.broadcastToSession(req.params.id, { type: 'snapshot', snapshot });
      } catch (e) {
        res.status(400).json({ error: errorMessage(e) });
      }
    });

    // ─── State Inspection ───
    app.get('/session/:id/snapshot', async (req, res) => {
      try {
        res.json(await this.getSnapshot(req.params.id));
      } catch (e) {
        res.status(404).json({ error: errorMessage(e) });
      }
    });

    // ─── Breakpoints ───
    app.post('/session/:id/breakpoint', async (req, res) => {
      try {
        const id = await this.addBreakpoint(req.params.id, parseBreakpointSpec(bodyOf(req)));
        res.json({ id });
      } catch (e) {
        res.status(400).json({ error: errorMessage(e) });
      }
    });

    app.delete('/session/:id/breakpoint/:bpId', async (req, res) => {
      try {
        await this.removeBreakpoint(req.params.id, req.params.bpId);
        res.json({ success: true });
      } catch (e) {
        res.status(404).json({ error: errorMessage(e) });
      }
    });

    app.get('/session/:id/breakpoints', async (req, res) => {
      try {
        res.json(await this.listBreakpoints(req.params.id));
      } catch (e) {
        res.status(404).json({ error: errorMessage(e) });
      }
    });
  }

  // ─────────────────────────────────────────────────────────────
  // WEBSOCKET
  // ─────────────────────────────────────────────────────────────

  private setupWebSocket() {
    this.wss.on('connection', (ws, req) => {
      // Parse session ID from query string: /ws?session=xxx
      const url = new URL(req.url ?? '', `http://${req.headers.host ?? 'localhost'}`);
      const sessionId = url.searchParams.get('session');
      const info = sessionId ? this.sessions.get(sessionId) : undefined;

      if (!sessionId || !info) {
        ws.close(4404, 'Session not found');
        return;
      }

      info.clients.add(ws);
      ws.send(JSON.stringify({ type: 'snapshot', snapshot: info.session.getSnapshot() }));

      ws.on('message', (data: RawData) => {
        try {
          this.handleWebSocketCommand(info, parseClientCommand(data.toString()), ws);
        } catch (e) {
          const event: ServerEvent = { type: 'error', error: { message: errorMessage(e) } };
          ws.send(JSON.stringify(event));
        }
      });

      ws.on('close', () => {
        info.clients.delete(ws);
      });
    });
  }

  private handleWebSocketCommand(info: SessionInfo, cmd: ClientCommand, ws: WebSocket) {
    const { session } = info;
    let result: StepResult;

    switch (cmd.type) {
      case 'load': {
        const loaded = session.loadCode(cmd.code, cmd.input);
        if (!loaded.success) {
          this.broadcastToSession(session.id, {
            type: 'error',
            error: { message: loaded.error ?? 'Load failed' },
            snapshot: session.getSnapshot(),
          });
          return;
        }
        this.broadcastSnapshot(session.id);
        return;
      }
      case 'step':
        result = session.step();
        break;
      case 'stepN':
        result = session.stepN(cmd.n);
        break;
      case 'continue':
        result = session.continue();
        break;
      case 'input':
        session.provideInput(cmd.text ?? '', cmd.end);
        this.broadcastSnapshot(session.id);
        return;
      case 'addBreakpoint': {
        const id = session.addBreakpoint(cmd.breakpoint);
        ws.send(JSON.stringify({ type: 'breakpointAdded', id }));
        return;
      }
      case 'removeBreakpoint':
        session.removeBreakpoint(cmd.breakpointId);
        ws.send(JSON.stringify({ type: 'breakpointRemoved', id: cmd.breakpointId }));
        return;
    }

    this.broadcastResult(session.id, result);
  }

  /** Snapshot to every client, then an event for anything other than a plain step. */
  private broadcastResult(sessionId: string, result: StepResult) {
    this.broadcastToSession(sessionId, { type: 'snapshot', snapshot: result.snapshot });

    switch (result.outcome) {
      case 'breakpoint':
        this.broadcastToSession(sessionId, {
          type: 'breakpointHit',
          breakpointId: result.breakpointId ?? '',
          snapshot: result.snapshot,
        });
        break;
      case 'awaiting-input':
        this.broadcastToSession(sessionId, { type: 'awaitingInput', snapshot: result.snapshot });
        break;
      case 'done':
        this.broadcastToSession(sessionId, {
          type: 'done',
          output: result.snapshot.output,
          snapshot: result.snapshot,
        });
        break;
      case 'error':
        this.broadcastToSession(sessionId, {
          type: 'error',
          error: result.snapshot.error ?? { message: 'No program loaded' },
          snapshot: result.snapshot,
        });
        break;
      case 'stepped':
        break;
    }
  }

  private broadcastSnapshot(sessionId: string) {
    const info = this.sessions.get(sessionId);
    if (!info) return;
    this.broadcastToSession(sessionId, { type: 'snapshot', snapshot: info.session.getSnapshot() });
  }

  private broadcastToSession(sessionId: string, event: ServerEvent) {
    const info = this.sessions.get(sessionId);
    if (!info) return;

    const msg = JSON.stringify(event);
    for (const client of info.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(msg);
      }
    }
  }

  private requireSession(sessionId: string): DebugSession {
    const info = this.sessions.get(sessionId);
    if (!info) throw new Error(`Session not found: ${sessionId}`);
    return info.session;
  }

  // ─────────────────────────────────────────────────────────────
  // IDebugService IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  async createSession(config?: SessionConfig): Promise<string> {
    const session = new DebugSession(config);
    this.sessions.set(session.id, { session, clients: new Set() });
    return session.id;
  }

  async listSessions(): Promise<SessionSummary[]> {
    return Array.from(this.sessions.entries()).map(([id, info]) => ({
      id,
      name: info.session.config.name,
      step: info.session.stepCount,
      status: info.session.status,
    }));
  }

  async getSession(sessionId: string): Promise<{ id: string; config: SessionConfig; snapshot: MachineSnapshot }> {
    const session = this.requireSession(sessionId);
    return {
      id: sessionId,
      config: session.config,
      snapshot: session.getSnapshot(),
    };
  }

  async closeSession(sessionId: string): Promise<void> {
    const info = this.sessions.get(sessionId);
    if (!info) throw new Error(`Session not found: ${sessionId}`);

    for (const client of info.clients) {
      client.close(1000, 'Session closed');
    }

    this.sessions.delete(sessionId);
  }

  async loadCode(sessionId: string, code: string, input?: string): Promise<LoadResult> {
    return this.requireSession(sessionId).loadCode(code, input);
  }

  async step(sessionId: string): Promise<StepResult> {
    return this.requireSession(sessionId).step();
  }

  async stepN(sessionId: string, n: number): Promise<StepResult> {
    return this.requireSession(sessionId).stepN(n);
  }

  async continue(sessionId: string): Promise<StepResult> {
    return this.requireSession(sessionId).continue();
  }

  async provideInput(sessionId: string, text: string, end = false): Promise<MachineSnapshot> {
    return this.requireSession(sessionId).provideInput(text, end);
  }

  async getSnapshot(sessionId: string): Promise<MachineSnapshot> {
    return this.requireSession(sessionId).getSnapshot();
  }

  async addBreakpoint(sessionId: string, bp: BreakpointSpec): Promise<string> {
    return this.requireSession(sessionId).addBreakpoint(bp);
  }

  async removeBreakpoint(sessionId: string, breakpointId: string): Promise<void> {
    this.requireSession(sessionId).removeBreakpoint(breakpointId);
  }

  async listBreakpoints(sessionId: string): Promise<Breakpoint[]> {
    return this.requireSession(sessionId).listBreakpoints();
  }

  async toggleBreakpoint(sessionId: string, breakpointId: string, enabled: boolean): Promise<void> {
    this.requireSession(sessionId).toggleBreakpoint(breakpointId, enabled);
  }

  // ─────────────────────────────────────────────────────────────
  // SERVER LIFECYCLE
  // ─────────────────────────────────────────────────────────────

  /** Port actually bound; differs from the requested one when that was 0. */
  get listeningPort(): number {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address.port : this.port;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, () => {
        const port = this.listeningPort;
        console.log(`\nbfkit debug server running at http://localhost:${port}`);
        console.log(`   WebSocket: ws://localhost:${port}/ws?session=<id>`);
        console.log(`   API: http://localhost:${port}/sessions`);
        console.log(`   Health: http://localhost:${port}/health\n`);
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.wss.close();
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
