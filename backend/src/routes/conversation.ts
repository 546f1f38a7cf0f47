import { Router } from 'express';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { Logger } from '../logger';
import type { Orchestrator } from '../services/orchestrator';
import type { SessionTurnGuard } from '../services/turnGuard';
import type { AudioEncoding, OrchestratorResult, TurnInput } from '../types';

const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: 25 * 1024 * 1024 } });

const encodingSchema = z.enum(['wav', 'webm', 'ogg', 'mp3', 'flac']);

const textTurnSchema = z.object({
  sessionId: z.string().min(1).max(200).optional(),
  text: z.string().trim().min(1).max(4000),
});

const sessionSchema = z.object({
  sessionId: z.string().min(1).max(200).optional(),
});

const audioTurnSchema = z.object({
  sessionId: z.string().min(1).max(200).optional(),
  encoding: encodingSchema.optional(),
});

const MIME_ENCODINGS: Record<string, AudioEncoding> = {
  'audio/wav': 'wav',
  'audio/wave': 'wav',
  'audio/x-wav': 'wav',
  'audio/webm': 'webm',
  'audio/ogg': 'ogg',
  'audio/mpeg': 'mp3',
  'audio/mp3': 'mp3',
  'audio/flac': 'flac',
};

export function encodingFromMime(mimetype: string): AudioEncoding {
  return MIME_ENCODINGS[mimetype.split(';')[0].trim().toLowerCase()] ?? 'webm';
}

/** JSON-safe form of a turn result; audio travels as base64. */
export function serializeResult(result: OrchestratorResult) {
  if (result.status === 'aborted') {
    return result;
  }
  const { audio, ...rest } = result;
  return { ...rest, audio: audio.toString('base64') };
}

export interface ConversationRouterDeps {
  orchestrator: Orchestrator;
  guard: SessionTurnGuard;
  logger: Logger;
}

export function createConversationRouter({ orchestrator, guard, logger }: ConversationRouterDeps): Router {
  const router = Router();
  const log = logger.child({ component: 'conversation-routes' });

  // Creates a session, or resumes the one named in the body.
  router.post('/session', async (req, res) => {
    const parsed = sessionSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid request', issues: parsed.error.issues });
    }
    try {
      const info = await orchestrator.initialize(parsed.data.sessionId);
      return res.status(info.created ? 201 : 200).json(info);
    } catch (error) {
      log.error({ err: error }, 'Session creation error');
      return res.status(500).json({ error: 'Failed to create session' });
    }
  });

  router.post('/turn', upload.single('audio'), async (req, res) => {
    let sessionId: string;
    let input: TurnInput;

    if (req.file) {
      const parsed = audioTurnSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: 'Invalid request', issues: parsed.error.issues });
      }
      sessionId = parsed.data.sessionId ?? `session_${uuidv4()}`;
      input = { audio: req.file.buffer, encoding: parsed.data.encoding ?? encodingFromMime(req.file.mimetype) };
    } else {
      const parsed = textTurnSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: 'Provide either an audio file or text', issues: parsed.error.issues });
      }
      sessionId = parsed.data.sessionId ?? `session_${uuidv4()}`;
      input = { text: parsed.data.text };
    }

    const controller = guard.begin(sessionId);
    if (!controller) {
      return res.status(409).json({ error: 'A turn is already in progress for this session', sessionId });
    }

    // Client went away before we answered.
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      await orchestrator.initialize(sessionId);
      const result = await orchestrator.process(sessionId, input, { signal: controller.signal });
      const status = result.status === 'done' ? 200 : result.error.kind === 'TurnCancelled' ? 499 : 502;
      return res.status(status).json(serializeResult(result));
    } catch (error) {
      log.error({ err: error, sessionId }, 'Turn processing error');
      return res.status(500).json({ error: 'Failed to process turn' });
    } finally {
      guard.end(sessionId, controller);
    }
  });

  router.post('/:sessionId/cancel', (req, res) => {
    const cancelled = guard.cancel(req.params.sessionId);
    return res.status(cancelled ? 202 : 404).json({ cancelled });
  });

  router.delete('/:sessionId', async (req, res) => {
    const { sessionId } = req.params;
    guard.cancel(sessionId);
    try {
      const removed = await orchestrator.endSession(sessionId);
      return removed ? res.status(204).end() : res.status(404).json({ error: 'Unknown session', sessionId });
    } catch (error) {
      log.error({ err: error, sessionId }, 'Session removal error');
      return res.status(500).json({ error: 'Failed to end session' });
    }
  });

  return router;
}
