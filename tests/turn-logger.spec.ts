import type { TurnLogRepository } from "../src/conversation/turn-log.repository";
import { InMemoryTurnLogRepository } from "../src/conversation/turn-log.repository";
import { interpret } from "../src/recommendation/interpreter";
import { createConversationState } from "../src/recommendation/state";
import { buildTurnRecord, TurnLogger } from "../src/recommendation/turn-logger";
import type { TurnRecord } from "../src/recommendation/types";
import { silentLogger, veggiePizza } from "./fixtures";

const sampleRecord = (): TurnRecord =>
  buildTurnRecord({
    state: { ...createConversationState("c1"), turnIndex: 1, score: 66.07 },
    utterance: "vegan pizza under $10",
    signals: interpret("vegan pizza under $10"),
    recommendations: [{ product: veggiePizza, matchScore: 9.3, rank: 1 }],
    relaxedFilters: false,
    reply: "I found 1 good matches for you!",
    timestamp: new Date("2024-05-01T12:00:00.000Z"),
  });

describe("Turn logger", () => {
  it("assembles an immutable record", () => {
    const record = sampleRecord();
    expect(record).toMatchObject({
      conversationId: "c1",
      turnIndex: 1,
      score: 66.07,
      utterance: "vegan pizza under $10",
      timestamp: "2024-05-01T12:00:00.000Z",
    });
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.signals.tags)).toBe(true);
    expect(Object.isFrozen(record.recommendations[0].product)).toBe(true);
    expect(Reflect.set(record, "score", 1)).toBe(false);
    expect(record.score).toBe(66.07);
  });

  it("does not freeze the caller's objects", () => {
    const signals = interpret("vegan");
    buildTurnRecord({
      state: createConversationState("c1"),
      utterance: "vegan",
      signals,
      recommendations: [],
      relaxedFilters: false,
      reply: "",
    });
    expect(Object.isFrozen(signals)).toBe(false);
  });

  it("appends to the store", async () => {
    const repo = new InMemoryTurnLogRepository();
    const logger = new TurnLogger(repo, silentLogger);
    await expect(logger.log(sampleRecord())).resolves.toBe(true);
    const stored = await repo.listByConversation("c1");
    expect(stored).toHaveLength(1);
    expect(stored[0].turnIndex).toBe(1);
  });

  it("keeps one copy per conversation, session and turn", async () => {
    const repo = new InMemoryTurnLogRepository();
    const record = sampleRecord();
    await repo.append(record);
    await repo.append(record);
    await repo.append({ ...record, sessionId: "another-session", utterance: "hi" });
    const stored = await repo.listByConversation("c1");
    expect(stored.map((r) => r.utterance)).toEqual(["vegan pizza under $10", "hi"]);
  });

  it("reports a failed append without throwing", async () => {
    const append = jest.fn(async () => {
      throw new Error("connection refused");
    });
    const repo: TurnLogRepository = {
      append,
      listByConversation: async () => [],
    };
    const logger = new TurnLogger(repo, silentLogger);
    await expect(logger.log(sampleRecord())).resolves.toBe(false);
    expect(append).toHaveBeenCalledTimes(2);
  });

  it("retries once after a transient failure", async () => {
    const append = jest
      .fn<Promise<void>, [TurnRecord]>()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValueOnce(undefined);
    const repo: TurnLogRepository = {
      append,
      listByConversation: async () => [],
    };
    await expect(new TurnLogger(repo, silentLogger).log(sampleRecord())).resolves.toBe(
      true
    );
    expect(append).toHaveBeenCalledTimes(2);
  });
});
