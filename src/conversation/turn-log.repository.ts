import type { Pool } from "pg";
import type {
  PreferenceSignals,
  Recommendation,
  TurnRecord,
} from "../recommendation/types";
import { StoreUnavailableError } from "../utils/store-error";

/**
 * Append-only sink for turn records. Appends may be repeated for the same
 * (conversationId, sessionId, turnIndex); stores keep the first copy.
 * Listing returns a conversation's records in append order.
 */
export interface TurnLogRepository {
  append(record: TurnRecord): Promise<void>;
  listByConversation(conversationId: string): Promise<TurnRecord[]>;
}

export class InMemoryTurnLogRepository implements TurnLogRepository {
  private readonly records: TurnRecord[] = [];

  async append(record: TurnRecord): Promise<void> {
    const exists = this.records.some(
      (r) =>
        r.conversationId === record.conversationId &&
        r.sessionId === record.sessionId &&
        r.turnIndex === record.turnIndex
    );
    if (!exists) this.records.push(record);
  }

  async listByConversation(conversationId: string): Promise<TurnRecord[]> {
    return this.records.filter((r) => r.conversationId === conversationId);
  }
}

type TurnRow = {
  conversation_id: string;
  session_id: string;
  turn_index: number;
  utterance: string;
  signals: PreferenceSignals;
  interest_score: string | number;
  recommendations: Recommendation[];
  relaxed_filters: boolean;
  reply: string;
  created_at: Date;
};

export class PgTurnLogRepository implements TurnLogRepository {
  constructor(private readonly pool: Pool) {}

  async append(record: TurnRecord): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO conversation_turns
           (conversation_id, session_id, turn_index, utterance, signals,
            interest_score, recommendations, relaxed_filters, reply, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         ON CONFLICT (conversation_id, session_id, turn_index) DO NOTHING`,
        [
          record.conversationId,
          record.sessionId,
          record.turnIndex,
          record.utterance,
          JSON.stringify(record.signals),
          record.score,
          JSON.stringify(record.recommendations),
          record.relaxedFilters,
          record.reply,
          record.timestamp,
        ]
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new StoreUnavailableError("log", `Turn log append failed: ${message}`);
    }
  }

  async listByConversation(conversationId: string): Promise<TurnRecord[]> {
    try {
      const result = await this.pool.query<TurnRow>(
        `SELECT conversation_id, session_id, turn_index, utterance, signals,
                interest_score, recommendations, relaxed_filters, reply, created_at
           FROM conversation_turns
          WHERE conversation_id = $1
          ORDER BY id ASC`,
        [conversationId]
      );
      return result.rows.map((row) => ({
        conversationId: row.conversation_id,
        sessionId: row.session_id,
        turnIndex: row.turn_index,
        utterance: row.utterance,
        signals: row.signals,
        score: Number(row.interest_score),
        recommendations: row.recommendations,
        relaxedFilters: row.relaxed_filters,
        reply: row.reply,
        timestamp: new Date(row.created_at).toISOString(),
      }));
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      throw new StoreUnavailableError("log", `Turn log query failed: ${message}`);
    }
  }
}
