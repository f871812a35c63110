import { randomUUID } from "crypto";
import type { Logger } from "pino";
import { CatalogService } from "../catalog/catalog.service";
import type { Product } from "../types/product";
import { filterCatalog } from "../recommendation/filter";
import { interpret, normalizeUtterance } from "../recommendation/interpreter";
import { DEFAULT_TOP_N, rankProducts } from "../recommendation/ranker";
import { scoreInterest } from "../recommendation/scorer";
import {
  advanceConversationState,
  DEFAULT_BASELINE_SCORE,
} from "../recommendation/state";
import { buildTurnRecord, TurnLogger } from "../recommendation/turn-logger";
import type {
  ConversationState,
  RankWeights,
  Recommendation,
  ScoreWeights,
  TurnRecord,
  TurnResult,
} from "../recommendation/types";
import { getDefaultVocabulary, Vocabulary } from "../recommendation/vocabulary";
import { defaultScoreWeights } from "../recommendation/weights";
import { ConversationStore } from "./conversation.store";
import { TurnLogRepository } from "./turn-log.repository";

export type EngineOptions = {
  topN: number;
  neutralBaselineScore: number;
  targetMatchRatio: number;
  matchRatioSpread: number;
  scoreWeights: ScoreWeights;
  rankWeights?: RankWeights;
};

export const defaultEngineOptions = (): EngineOptions => ({
  topN: DEFAULT_TOP_N,
  neutralBaselineScore: DEFAULT_BASELINE_SCORE,
  targetMatchRatio: 0.2,
  matchRatioSpread: 0.1,
  scoreWeights: defaultScoreWeights(),
});

export type ConversationView = {
  conversationId: string;
  score: number;
  turnIndex: number;
  accumulatedTags: string[];
  budgetCeiling: number | null;
  mood: string | null;
  scoreHistory: number[];
  updatedAt: string;
};

export const buildReply = (recommendations: Recommendation[]): string =>
  recommendations.length > 0
    ? `I found ${recommendations.length} good matches for you!`
    : "Hmm, I couldn't find a perfect match. Try rephrasing.";

const toView = (state: ConversationState): ConversationView => ({
  conversationId: state.conversationId,
  score: state.score,
  turnIndex: state.turnIndex,
  accumulatedTags: [...state.accumulatedTags],
  budgetCeiling: state.budgetCeiling ?? null,
  mood: state.mood ?? null,
  scoreHistory: [...state.scoreHistory],
  updatedAt: new Date(state.updatedAt).toISOString(),
});

export class ConversationService {
  private readonly store: ConversationStore;
  private readonly turnLogger: TurnLogger;
  private readonly options: EngineOptions;

  constructor(
    private readonly catalog: CatalogService,
    private readonly turnLog: TurnLogRepository,
    private readonly logger: Logger,
    options: Partial<EngineOptions> = {},
    private readonly vocabulary: Vocabulary = getDefaultVocabulary()
  ) {
    this.options = { ...defaultEngineOptions(), ...options };
    this.store = new ConversationStore(this.options.neutralBaselineScore);
    this.turnLogger = new TurnLogger(turnLog, logger);
  }

  startConversation(): ConversationView {
    const state = this.store.getOrCreate(randomUUID());
    this.logger.info(
      { conversationId: state.conversationId },
      "Conversation started"
    );
    return toView(state);
  }

  /**
   * Process one chat message. Never throws for normal input: catalog
   * unavailability comes back as a failure variant and log-store problems
   * only clear `logPersisted`.
   */
  processTurn(conversationId: string, utterance: unknown): Promise<TurnResult> {
    return this.store.runExclusive(conversationId, async (): Promise<TurnResult> => {
      // Read before any await so an end() during the catalog call is seen.
      const prior = this.store.get(conversationId);
      let catalog: readonly Product[];
      try {
        catalog = await this.catalog.getSnapshot();
      } catch (error) {
        const message =
          error instanceof Error ? error.message : "Catalog unavailable";
        this.logger.error(
          { err: error, conversationId },
          "Catalog unavailable, turn aborted"
        );
        return { ok: false, error: { kind: "CATALOG_UNAVAILABLE", message } };
      }

      const text = normalizeUtterance(utterance);
      const state = prior ?? this.store.getOrCreate(conversationId);
      const signals = interpret(text, this.vocabulary);
      const filtered = filterCatalog(catalog, signals, state);

      const { score, breakdown } = scoreInterest(
        {
          prior: state.score,
          signals,
          matchCount: filtered.products.length,
          catalogSize: catalog.length,
          specifiedDimensions: state.specifiedDimensions,
          hardFiltersActive: filtered.hardFiltersActive,
          relaxedFilters: filtered.relaxedFilters,
        },
        {
          weights: this.options.scoreWeights,
          targetMatchRatio: this.options.targetMatchRatio,
          matchRatioSpread: this.options.matchRatioSpread,
        }
      );
      const next = advanceConversationState(state, signals, score);
      if (!this.store.save(next)) {
        this.logger.info(
          { conversationId, turnIndex: next.turnIndex },
          "Conversation ended during turn, state discarded"
        );
      }

      const recommendations = rankProducts(
        filtered.products,
        { ...signals, mood: signals.mood ?? state.mood },
        this.options.topN,
        {
          weights: this.options.rankWeights,
          moodCategoryAffinity: this.vocabulary.moodCategoryAffinity,
          tags: filtered.effectiveTags,
          budgetCeiling: filtered.effectiveBudget,
        }
      );
      const reply = buildReply(recommendations);

      this.logger.debug(
        {
          conversationId,
          turnIndex: next.turnIndex,
          score,
          breakdown,
          relaxed: filtered.droppedFilters,
        },
        "Turn scored"
      );

      const record = buildTurnRecord({
        state: next,
        utterance: text,
        signals,
        recommendations,
        relaxedFilters: filtered.relaxedFilters,
        reply,
      });
      const logPersisted = await this.turnLogger.log(record);

      return {
        ok: true,
        conversationId,
        turnIndex: next.turnIndex,
        score: next.score,
        recommendations,
        relaxedFilters: filtered.relaxedFilters,
        droppedFilters: filtered.droppedFilters,
        signals,
        reply,
        logPersisted,
      };
    });
  }

  getConversation(conversationId: string): ConversationView | undefined {
    const state = this.store.get(conversationId);
    return state ? toView(state) : undefined;
  }

  async listTurns(conversationId: string): Promise<TurnRecord[]> {
    return this.turnLog.listByConversation(conversationId);
  }

  endConversation(conversationId: string): boolean {
    const ended = this.store.end(conversationId);
    if (ended) this.logger.info({ conversationId }, "Conversation ended");
    return ended;
  }

  pruneIdleConversations(maxIdleMs: number, now: number = Date.now()) {
    return this.store.pruneIdle(maxIdleMs, now);
  }

  activeConversations(): number {
    return this.store.size();
  }
}
