// src/services/sessionStore.ts
// What: In-memory conversation history per session, bounded to the last N exchanges.
// How: Each session is an array of (user, assistant) pairs; recordExchange appends and evicts from the front.

import { v4 as uuidv4 } from 'uuid';
import type { RagSettings } from '../config/settings.js';

interface Exchange {
  user: string;
  assistant: string;
}

export class SessionStore {
  private readonly sessions = new Map<string, Exchange[]>();
  private readonly maxHistory: number;

  constructor(settings: Pick<RagSettings, 'maxHistory'>) {
    this.maxHistory = settings.maxHistory;
  }

  createSession(): string {
    const id = uuidv4();
    this.sessions.set(id, []);
    return id;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  historyText(sessionId: string): string | null {
    const exchanges = this.sessions.get(sessionId);
    if (!exchanges || exchanges.length === 0) return null;
    return exchanges.map((e) => `user: ${e.user}\nassistant: ${e.assistant}`).join('\n');
  }

  recordExchange(sessionId: string, userMessage: string, assistantMessage: string): void {
    const exchanges = this.sessions.get(sessionId) ?? [];
    exchanges.push({ user: userMessage, assistant: assistantMessage });
    while (exchanges.length > this.maxHistory) exchanges.shift();
    this.sessions.set(sessionId, exchanges);
  }

  clearSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }
}
