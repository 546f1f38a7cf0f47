import type { Preferences, Turn } from '../types';
import { cosineSimilarity, termVector, type TermVector } from './textSimilarity';

export interface SessionInfo {
  sessionId: string;
  created: boolean;
  createdAt: number;
  turnCount: number;
}

/**
 * Session history and preferences, keyed by session id. Implementations
 * reject `append` when the write does not land.
 */
export interface MemoryStore {
  ensureSession(sessionId: string): Promise<SessionInfo>;
  fetchRecent(sessionId: string, n: number): Promise<Turn[]>;
  append(sessionId: string, turn: Turn): Promise<void>;
  detectRepetition(sessionId: string, utterance: string): Promise<boolean>;
  getPreferences(sessionId: string): Promise<Preferences>;
  /** Forgets a session; resolves false when it was not known. */
  deleteSession(sessionId: string): Promise<boolean>;
  close(): Promise<void>;
}

export interface InMemoryStoreOptions {
  repetitionThreshold: number;
  repetitionWindow: number;
  /** Preferences per session id, available from the first turn. */
  preferences?: Record<string, Preferences>;
  /** Sessions idle for longer than this are dropped. */
  sessionTtlMs?: number;
  /** Least recently active sessions are dropped beyond this count. */
  maxSessions?: number;
  /** Oldest turns of a session are dropped beyond this count. */
  maxTurns?: number;
  now?: () => number;
}

interface SessionRecord {
  createdAt: number;
  lastActiveAt: number;
  turns: Turn[];
  preferences: Preferences;
  recentUtterances: TermVector[];
}

function freezeTurn(turn: Turn): Turn {
  return Object.freeze({
    ...turn,
    emotion: Object.freeze({ ...turn.emotion }),
    style: Object.freeze({ ...turn.style }),
  });
}

export class InMemoryMemoryStore implements MemoryStore {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly threshold: number;
  private readonly windowSize: number;
  private readonly seededPreferences: Record<string, Preferences>;
  private readonly sessionTtlMs: number;
  private readonly maxSessions: number;
  private readonly maxTurns: number;
  private readonly now: () => number;

  constructor(options: InMemoryStoreOptions) {
    this.threshold = options.repetitionThreshold;
    this.windowSize = options.repetitionWindow;
    this.seededPreferences = options.preferences ?? {};
    this.sessionTtlMs = options.sessionTtlMs ?? Infinity;
    this.maxSessions = options.maxSessions ?? Infinity;
    this.maxTurns = options.maxTurns ?? Infinity;
    this.now = options.now ?? Date.now;
  }

  async ensureSession(sessionId: string): Promise<SessionInfo> {
    const existing = this.touch(sessionId);
    const record = existing ?? this.create(sessionId);
    return { sessionId, created: !existing, createdAt: record.createdAt, turnCount: record.turns.length };
  }

  async fetchRecent(sessionId: string, n: number): Promise<Turn[]> {
    const record = this.touch(sessionId);
    if (!record || n <= 0) return [];
    return record.turns.slice(-n);
  }

  async append(sessionId: string, turn: Turn): Promise<void> {
    const record = this.touch(sessionId) ?? this.create(sessionId);
    record.turns.push(freezeTurn(turn));
    if (record.turns.length > this.maxTurns) {
      record.turns.splice(0, record.turns.length - this.maxTurns);
    }
    record.recentUtterances.push(termVector(turn.userText));
    if (record.recentUtterances.length > this.windowSize) {
      record.recentUtterances.splice(0, record.recentUtterances.length - this.windowSize);
    }
  }

  async detectRepetition(sessionId: string, utterance: string): Promise<boolean> {
    const record = this.touch(sessionId);
    if (!record) return false;
    const vector = termVector(utterance);
    return record.recentUtterances.some((previous) => cosineSimilarity(vector, previous) >= this.threshold);
  }

  async getPreferences(sessionId: string): Promise<Preferences> {
    const record = this.touch(sessionId);
    return { ...(record?.preferences ?? this.seededPreferences[sessionId] ?? {}) };
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  /** Drops idle sessions; returns how many went. */
  prune(): number {
    const before = this.sessions.size;
    const cutoff = this.now() - this.sessionTtlMs;
    // Map order is least recently active first.
    for (const [sessionId, record] of this.sessions) {
      if (record.lastActiveAt > cutoff) break;
      this.sessions.delete(sessionId);
    }
    return before - this.sessions.size;
  }

  get size(): number {
    return this.sessions.size;
  }

  async close(): Promise<void> {
    this.sessions.clear();
  }

  // Live record for the session, moved to the most recently active end.
  private touch(sessionId: string): SessionRecord | undefined {
    this.prune();
    const record = this.sessions.get(sessionId);
    if (!record) return undefined;
    record.lastActiveAt = this.now();
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, record);
    return record;
  }

  private create(sessionId: string): SessionRecord {
    for (const oldest of this.sessions.keys()) {
      if (this.sessions.size < this.maxSessions) break;
      this.sessions.delete(oldest);
    }
    const now = this.now();
    const record: SessionRecord = {
      createdAt: now,
      lastActiveAt: now,
      turns: [],
      preferences: { ...(this.seededPreferences[sessionId] ?? {}) },
      recentUtterances: [],
    };
    this.sessions.set(sessionId, record);
    return record;
  }
}
