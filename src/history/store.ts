import type { VerdictMetadata } from '../types/index.js';
import type { ChatMessage } from '../inference/index.js';

export interface HistoryRecord {
  role: 'user' | 'assistant';
  content: string;
  timestamp: string;
  verdict?: VerdictMetadata;
  /** Input the guardrails blocked; kept for display, never sent to the model. */
  rejected?: boolean;
}

export interface HistoryStore {
  append(sessionId: string, record: HistoryRecord): void;
  list(sessionId: string): HistoryRecord[];
  /** Most recent accepted messages whose estimated size fits in `maxTokens`, oldest first. */
  window(sessionId: string, maxTokens: number): ChatMessage[];
  clear(sessionId: string): void;
}

// Rough approximation: 4 characters per token
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

export class InMemoryHistoryStore implements HistoryStore {
  private sessions: Map<string, HistoryRecord[]> = new Map();

  constructor(private readonly maxMessages: number = 50) {}

  append(sessionId: string, record: HistoryRecord): void {
    const records = this.sessions.get(sessionId) ?? [];
    records.push(record);
    if (records.length > this.maxMessages) {
      records.splice(0, records.length - this.maxMessages);
    }
    this.sessions.set(sessionId, records);
  }

  list(sessionId: string): HistoryRecord[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  window(sessionId: string, maxTokens: number): ChatMessage[] {
    const records = this.sessions.get(sessionId) ?? [];
    const selected: ChatMessage[] = [];
    let total = 0;

    for (let i = records.length - 1; i >= 0; i--) {
      const record = records[i];
      if (!record || record.rejected) continue;
      total += estimateTokens(record.content);
      if (total > maxTokens) break;
      selected.unshift({ role: record.role, content: record.content });
    }

    return selected;
  }

  clear(sessionId: string): void {
    this.sessions.delete(sessionId);
  }
}
