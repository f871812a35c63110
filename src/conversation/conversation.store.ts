import { createConversationState } from "../recommendation/state";
import type { ConversationState } from "../recommendation/types";

/**
 * Holds one ConversationState per active conversation. Turns of the same
 * conversation run one at a time through `runExclusive`.
 */
export class ConversationStore {
  private readonly sessions = new Map<string, ConversationState>();
  private readonly queues = new Map<string, Promise<void>>();

  constructor(private readonly baselineScore: number) {}

  get(conversationId: string): ConversationState | undefined {
    return this.sessions.get(conversationId);
  }

  getOrCreate(conversationId: string, now: number = Date.now()) {
    const existing = this.sessions.get(conversationId);
    if (existing) return existing;
    const created = createConversationState(
      conversationId,
      this.baselineScore,
      now
    );
    this.sessions.set(conversationId, created);
    return created;
  }

  // Only replaces the state it was advanced from. A state that was ended or
  // pruned while its turn ran stays gone.
  save(state: ConversationState): boolean {
    const current = this.sessions.get(state.conversationId);
    if (!current || current.sessionId !== state.sessionId) return false;
    this.sessions.set(state.conversationId, state);
    return true;
  }

  has(conversationId: string): boolean {
    return this.sessions.has(conversationId);
  }

  end(conversationId: string): boolean {
    return this.sessions.delete(conversationId);
  }

  size(): number {
    return this.sessions.size;
  }

  // Drops conversations whose last turn is older than maxIdleMs.
  pruneIdle(maxIdleMs: number, now: number = Date.now()): string[] {
    const removed: string[] = [];
    for (const [id, state] of this.sessions) {
      if (now - state.updatedAt > maxIdleMs) {
        this.sessions.delete(id);
        removed.push(id);
      }
    }
    return removed;
  }

  runExclusive<T>(conversationId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(conversationId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(conversationId, tail);
    void tail.then(() => {
      if (this.queues.get(conversationId) === tail) {
        this.queues.delete(conversationId);
      }
    });
    return run;
  }
}
