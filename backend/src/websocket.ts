import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { Logger } from './logger';
import { serializeResult } from './routes/conversation';
import type { Orchestrator } from './services/orchestrator';
import type { SessionTurnGuard } from './services/turnGuard';
import type { PipelineState, TurnInput } from './types';

/**
 * Socket currently attached to each session. A session resumed from a new
 * connection takes over the mapping; the old connection can no longer release it.
 */
export class SocketRegistry<S> {
  private readonly sockets = new Map<string, S>();

  register(sessionId: string, socket: S): void {
    this.sockets.set(sessionId, socket);
  }

  get(sessionId: string): S | undefined {
    return this.sockets.get(sessionId);
  }

  /** False when another socket owns the session by now. */
  release(sessionId: string, socket: S): boolean {
    if (this.sockets.get(sessionId) !== socket) return false;
    this.sockets.delete(sessionId);
    return true;
  }
}

const activeSockets = new SocketRegistry<WebSocket>();

/** Closing socket gives up its session; the turn is cancelled only if it still owned it. */
export function detachSocket<S>(registry: SocketRegistry<S>, guard: SessionTurnGuard, sessionId: string, socket: S): boolean {
  if (!registry.release(sessionId, socket)) return false;
  guard.cancel(sessionId);
  return true;
}

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('init'), sessionId: z.string().min(1).max(200).optional() }),
  z.object({ type: z.literal('text'), text: z.string().trim().min(1).max(4000) }),
  z.object({
    type: z.literal('audio'),
    audio: z.string().min(1),
    encoding: z.enum(['wav', 'webm', 'ogg', 'mp3', 'flac']).default('webm'),
  }),
  z.object({ type: z.literal('cancel') }),
  z.object({ type: z.literal('ping') }),
]);

function send(ws: WebSocket, payload: Record<string, unknown>): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify({ ...payload, timestamp: new Date().toISOString() }));
  }
}

/** Forwards orchestrator state transitions to the session's socket. */
export function notifyState(sessionId: string, state: PipelineState): void {
  const ws = activeSockets.get(sessionId);
  if (ws) send(ws, { type: 'state', state });
}

export interface WebSocketDeps {
  orchestrator: Orchestrator;
  guard: SessionTurnGuard;
  logger: Logger;
}

export function setupWebSocket(wss: WebSocketServer, { orchestrator, guard, logger }: WebSocketDeps): void {
  const log = logger.child({ component: 'websocket' });

  wss.on('connection', (ws: WebSocket) => {
    let sessionId: string | null = null;

    const runTurn = async (id: string, input: TurnInput): Promise<void> => {
      const controller = guard.begin(id);
      if (!controller) {
        send(ws, { type: 'busy', sessionId: id });
        return;
      }
      try {
        const result = await orchestrator.process(id, input, { signal: controller.signal });
        send(ws, { type: 'result', result: serializeResult(result) });
      } finally {
        guard.end(id, controller);
      }
    };

    const handle = async (message: RawData): Promise<void> => {
      const parsed = clientMessageSchema.safeParse(JSON.parse(message.toString()));
      if (!parsed.success) {
        send(ws, { type: 'error', error: 'Invalid message', issues: parsed.error.issues });
        return;
      }
      const data = parsed.data;

      if (data.type === 'ping') {
        send(ws, { type: 'pong' });
        return;
      }

      if (data.type === 'init') {
        if (sessionId) activeSockets.release(sessionId, ws);
        sessionId = data.sessionId ?? `session_${uuidv4()}`;
        const info = await orchestrator.initialize(sessionId);
        activeSockets.register(sessionId, ws);
        send(ws, { type: 'session_created', sessionId, resumed: !info.created, turns: info.turnCount });
        return;
      }

      if (!sessionId) {
        send(ws, { type: 'error', error: 'Send init before anything else' });
        return;
      }

      switch (data.type) {
        case 'text':
          await runTurn(sessionId, { text: data.text });
          break;
        case 'audio':
          await runTurn(sessionId, { audio: Buffer.from(data.audio, 'base64'), encoding: data.encoding });
          break;
        case 'cancel':
          send(ws, { type: 'cancelled', cancelled: guard.cancel(sessionId) });
          break;
      }
    };

    ws.on('message', (message: RawData) => {
      handle(message).catch((error: unknown) => {
        log.error({ err: error, sessionId }, 'WebSocket message error');
        send(ws, { type: 'error', error: 'Failed to handle message' });
      });
    });

    ws.on('close', () => {
      if (sessionId) detachSocket(activeSockets, guard, sessionId, ws);
    });

    ws.on('error', (error) => {
      log.error({ err: error, sessionId }, 'WebSocket error');
    });
  });
}
