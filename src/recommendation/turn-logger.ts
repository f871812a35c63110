import type { Logger } from "pino";
import type { TurnLogRepository } from "../conversation/turn-log.repository";
import {
  ConversationState,
  PreferenceSignals,
  Recommendation,
  TurnRecord,
} from "./types";

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
};

export const buildTurnRecord = (params: {
  state: ConversationState;
  utterance: string;
  signals: PreferenceSignals;
  recommendations: Recommendation[];
  relaxedFilters: boolean;
  reply: string;
  timestamp?: Date;
}): TurnRecord => {
  const record: TurnRecord = {
    conversationId: params.state.conversationId,
    sessionId: params.state.sessionId,
    turnIndex: params.state.turnIndex,
    utterance: params.utterance,
    signals: structuredClone(params.signals),
    score: params.state.score,
    recommendations: structuredClone(params.recommendations),
    relaxedFilters: params.relaxedFilters,
    reply: params.reply,
    timestamp: (params.timestamp ?? new Date()).toISOString(),
  };
  return deepFreeze(record);
};

/**
 * Hands turn records to the log store. A failed append is retried and then
 * reported through the return value; it never fails the turn.
 */
export class TurnLogger {
  constructor(
    private readonly repository: TurnLogRepository,
    private readonly logger: Logger,
    private readonly attempts = 2
  ) {}

  async log(record: TurnRecord): Promise<boolean> {
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        await this.repository.append(record);
        return true;
      } catch (error) {
        this.logger.warn(
          {
            err: error,
            conversationId: record.conversationId,
            turnIndex: record.turnIndex,
            attempt,
          },
          "Failed to append turn record"
        );
      }
    }
    return false;
  }
}
