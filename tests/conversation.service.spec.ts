import {
  CatalogRepository,
  InMemoryCatalogRepository,
} from "../src/catalog/catalog.repository";
import { CatalogService } from "../src/catalog/catalog.service";
import { ConversationService } from "../src/conversation/conversation.service";
import {
  InMemoryTurnLogRepository,
  TurnLogRepository,
} from "../src/conversation/turn-log.repository";
import { emptySignals } from "../src/recommendation/interpreter";
import type { TurnResult, TurnSuccess } from "../src/recommendation/types";
import { StoreUnavailableError } from "../src/utils/store-error";
import { scenarioCatalog, silentLogger } from "./fixtures";

const build = (
  catalogRepo: CatalogRepository = new InMemoryCatalogRepository(scenarioCatalog()),
  turnLog: TurnLogRepository = new InMemoryTurnLogRepository()
) =>
  new ConversationService(new CatalogService(catalogRepo), turnLog, silentLogger);

const expectOk = (result: TurnResult): TurnSuccess => {
  if (!result.ok) throw new Error(`turn failed: ${result.error.message}`);
  return result;
};

describe("ConversationService.processTurn", () => {
  it("recommends the vegan pizza and raises the score", async () => {
    const service = build();
    const result = expectOk(
      await service.processTurn("c1", "vegan pizza under $10")
    );
    expect(result.recommendations.map((r) => [r.product.id, r.rank])).toEqual([
      [1, 1],
    ]);
    expect(result.score).toBe(66.07);
    expect(result.relaxedFilters).toBe(false);
    expect(result.turnIndex).toBe(1);
    expect(result.reply).toBe("I found 1 good matches for you!");
    expect(result.logPersisted).toBe(true);
  });

  it("keeps the score for small talk and shows the whole catalog", async () => {
    const service = build();
    const result = expectOk(await service.processTurn("c1", "hello"));
    expect(result.score).toBe(50);
    expect(result.relaxedFilters).toBe(false);
    expect(result.recommendations.map((r) => r.product.id)).toEqual([1, 2]);
  });

  it("relaxes an impossible budget and applies the penalty", async () => {
    const service = build();
    const result = expectOk(await service.processTurn("c1", "something under $2"));
    expect(result.relaxedFilters).toBe(true);
    expect(result.droppedFilters).toEqual(["budget"]);
    expect(result.recommendations).toHaveLength(2);
    // +8 for the new budget dimension, -5 for relaxing
    expect(result.score).toBe(53);
  });

  it("does not reward the same mood twice", async () => {
    const service = build();
    const first = expectOk(await service.processTurn("c1", "spicy"));
    const second = expectOk(await service.processTurn("c1", "spicy"));
    expect(first.score).toBe(66.07);
    expect(second.score).toBe(66.14);
    expect(second.recommendations.map((r) => r.product.id)).toEqual([2]);
  });

  it("treats non-text input as an empty utterance", async () => {
    const service = build();
    const result = expectOk(await service.processTurn("c1", { text: "vegan" }));
    expect(result.signals).toEqual(emptySignals());
    expect(result.score).toBe(50);
    const [record] = await service.listTurns("c1");
    expect(record.utterance).toBe("");
  });

  it("fails the turn when the catalog is unavailable", async () => {
    const service = build({
      queryProducts: async () => {
        throw new StoreUnavailableError("catalog", "Catalog query failed: ECONNREFUSED");
      },
    });
    const result = await service.processTurn("c1", "vegan");
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "CATALOG_UNAVAILABLE",
        message: "Catalog query failed: ECONNREFUSED",
      },
    });
    expect(service.getConversation("c1")).toBeUndefined();
  });

  it("completes the turn when the log store is down", async () => {
    const service = build(undefined, {
      append: async () => {
        throw new StoreUnavailableError("log", "down");
      },
      listByConversation: async () => [],
    });
    const result = expectOk(await service.processTurn("c1", "vegan"));
    expect(result.logPersisted).toBe(false);
    expect(service.getConversation("c1")?.turnIndex).toBe(1);
  });

  it("keeps the score in range and never drops accumulated tags", async () => {
    const service = new ConversationService(
      new CatalogService(new InMemoryCatalogRepository()),
      new InMemoryTurnLogRepository(),
      silentLogger
    );
    const utterances = [
      "hello",
      "I really love spicy food!!",
      "something vegan under $8",
      "too expensive, I hate it",
      "maybe gluten free tacos",
      "under $1",
      "I'll take it, how much?",
      "",
      "meh",
    ];
    let previousTags: string[] = [];
    let expectedTurn = 0;
    for (const text of utterances) {
      const result = expectOk(await service.processTurn("c1", text));
      expectedTurn += 1;
      expect(result.turnIndex).toBe(expectedTurn);
      expect(result.score).toBeGreaterThanOrEqual(0);
      expect(result.score).toBeLessThanOrEqual(100);
      expect(result.recommendations.length).toBeLessThanOrEqual(5);
      const view = service.getConversation("c1");
      for (const tag of previousTags) expect(view?.accumulatedTags).toContain(tag);
      previousTags = view?.accumulatedTags ?? [];
    }
    expect(service.getConversation("c1")?.scoreHistory).toHaveLength(
      utterances.length
    );
  });

  it("serializes concurrent turns of one conversation", async () => {
    const service = build();
    const results = await Promise.all([
      service.processTurn("c1", "vegan"),
      service.processTurn("c1", "spicy"),
      service.processTurn("c2", "hello"),
    ]);
    const [a, b, c] = results.map(expectOk);
    expect([a.turnIndex, b.turnIndex]).toEqual([1, 2]);
    expect(c.turnIndex).toBe(1);
    const turns = await service.listTurns("c1");
    expect(turns.map((t) => [t.turnIndex, t.utterance])).toEqual([
      [1, "vegan"],
      [2, "spicy"],
    ]);
  });

  it("keeps conversations separate and discards ended ones", async () => {
    const service = build();
    await service.processTurn("c1", "vegan under $10");
    await service.processTurn("c2", "hello");
    expect(service.getConversation("c1")?.budgetCeiling).toBe(10);
    expect(service.getConversation("c2")?.budgetCeiling).toBeNull();

    expect(service.endConversation("c1")).toBe(true);
    expect(service.getConversation("c1")).toBeUndefined();
    expect(service.endConversation("c1")).toBe(false);
  });

  it("prunes idle conversations", async () => {
    const service = build();
    await service.processTurn("c1", "hello");
    expect(service.pruneIdleConversations(60_000)).toEqual([]);
    expect(service.pruneIdleConversations(60_000, Date.now() + 120_000)).toEqual([
      "c1",
    ]);
    expect(service.activeConversations()).toBe(0);
  });

  it("keeps the log of an id reused after the conversation ended", async () => {
    const service = build();
    expectOk(await service.processTurn("c1", "vegan"));
    expect(service.endConversation("c1")).toBe(true);

    const again = expectOk(await service.processTurn("c1", "spicy burger"));
    expect(again.turnIndex).toBe(1);
    expect(again.logPersisted).toBe(true);

    const turns = await service.listTurns("c1");
    expect(turns.map((t) => [t.turnIndex, t.utterance])).toEqual([
      [1, "vegan"],
      [1, "spicy burger"],
    ]);
    expect(turns[0].sessionId).not.toBe(turns[1].sessionId);
  });

  it("does not revive a conversation ended while its turn runs", async () => {
    let hold = false;
    let release: () => void = () => undefined;
    const repo: CatalogRepository = {
      queryProducts: async () => {
        if (hold) {
          await new Promise<void>((resolve) => {
            release = resolve;
          });
        }
        return scenarioCatalog();
      },
    };
    const service = build(repo);
    expectOk(await service.processTurn("c1", "vegan"));

    hold = true;
    const pending = service.processTurn("c1", "spicy");
    await new Promise((resolve) => setImmediate(resolve));
    expect(service.endConversation("c1")).toBe(true);
    release();

    const result = expectOk(await pending);
    expect(result.turnIndex).toBe(2);
    expect(service.getConversation("c1")).toBeUndefined();
    expect(service.activeConversations()).toBe(0);
  });

  it("starts a conversation with a generated id", () => {
    const service = build();
    const view = service.startConversation();
    expect(view.conversationId).toMatch(/^[0-9a-f-]{36}$/);
    expect(view.score).toBe(50);
    expect(view.turnIndex).toBe(0);
  });
});
