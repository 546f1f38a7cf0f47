import express from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { createServer } from 'http';
import { WebSocketServer } from 'ws';
import { loadConfig } from '@/config';
import { createLogger } from '@/logger';
import { InMemoryMemoryStore } from '@/memory/memoryStore';
import { createGateways } from '@/providers';
import { createConversationRouter } from '@/routes/conversation';
import { createProvidersRouter } from '@/routes/providers';
import { EmotionClassifier } from '@/services/emotionClassifier';
import { FallbackManager } from '@/services/fallbackManager';
import { MarkupBuilder } from '@/services/markupBuilder';
import { Orchestrator } from '@/services/orchestrator';
import { StyleSelector } from '@/services/styleSelector';
import { SessionTurnGuard } from '@/services/turnGuard';
import { notifyState, setupWebSocket } from '@/websocket';

dotenv.config();

const config = loadConfig();
const logger = createLogger(config.logLevel);

// Provider health lives for the whole process; only the admin reset clears it.
const fallbackManager = new FallbackManager({ ...config.fallback, logger: logger.child({ component: 'fallback' }) });
const gateways = createGateways(config, fallbackManager, logger);

const orchestrator = new Orchestrator({
  ...gateways,
  memory: new InMemoryMemoryStore(config.memory),
  classifier: new EmotionClassifier(undefined, logger.child({ component: 'emotion' })),
  styleSelector: new StyleSelector({ escalationThreshold: config.dialogue.escalationThreshold }),
  markup: new MarkupBuilder({ voice: config.azure.voice, maxEmphasis: config.dialogue.maxEmphasis }),
  historyTurns: config.dialogue.historyTurns,
  logger,
  onStateChange: notifyState,
});
const guard = new SessionTurnGuard();

const app = express();
const server = createServer(app);
const wss = new WebSocketServer({ server });

app.use(cors({
  origin: config.corsOrigin,
  credentials: true
}));
app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: true }));

// Routes
app.use('/api/conversation', createConversationRouter({ orchestrator, guard, logger }));
app.use('/api/providers', createProvidersRouter({ fallbackManager, gateways, logger }));

// Health check
app.get('/health', (req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

setupWebSocket(wss, { orchestrator, guard, logger });

server.listen(config.port, () => {
  logger.info({ port: config.port, corsOrigin: config.corsOrigin }, 'Voice orchestrator listening');
});

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down');
  wss.close();
  server.close();
  await orchestrator.shutdown();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  });
}
