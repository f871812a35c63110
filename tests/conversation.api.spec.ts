import request from "supertest";
import { createApp } from "../src/app";
import {
  CatalogRepository,
  InMemoryCatalogRepository,
} from "../src/catalog/catalog.repository";
import { CatalogService } from "../src/catalog/catalog.service";
import { ConversationService } from "../src/conversation/conversation.service";
import { InMemoryTurnLogRepository } from "../src/conversation/turn-log.repository";
import { StoreUnavailableError } from "../src/utils/store-error";
import { scenarioCatalog, silentLogger } from "./fixtures";

const buildApp = (
  catalogRepo: CatalogRepository = new InMemoryCatalogRepository(scenarioCatalog())
) => {
  const catalogService = new CatalogService(catalogRepo);
  const conversationService = new ConversationService(
    catalogService,
    new InMemoryTurnLogRepository(),
    silentLogger
  );
  return createApp({ catalogService, conversationService });
};

describe("Conversation API", () => {
  it("POST /api/conversations creates a conversation", async () => {
    const res = await request(buildApp()).post("/api/conversations");
    expect(res.status).toBe(201);
    expect(typeof res.body.data.conversationId).toBe("string");
    expect(res.body.data.score).toBe(50);
  });

  it("POST /api/conversations/:id/turns processes a chat message", async () => {
    const app = buildApp();
    const res = await request(app)
      .post("/api/conversations/c-1/turns")
      .send({ utterance: "vegan pizza under $10" });
    expect(res.status).toBe(200);
    expect(res.body.data.ok).toBe(true);
    expect(res.body.data.score).toBe(66.07);
    expect(res.body.data.recommendations).toHaveLength(1);
    expect(res.body.data.recommendations[0].product.name).toBe("Veggie Pizza");
    expect(res.body.data.recommendations[0].rank).toBe(1);

    const state = await request(app).get("/api/conversations/c-1");
    expect(state.status).toBe(200);
    expect(state.body.data.turnIndex).toBe(1);
    expect(state.body.data.scoreHistory).toEqual([66.07]);
    expect(state.body.data.accumulatedTags).toEqual(["vegan"]);

    const turns = await request(app).get("/api/conversations/c-1/turns");
    expect(turns.status).toBe(200);
    expect(turns.body.data).toHaveLength(1);
    expect(turns.body.data[0].reply).toBe("I found 1 good matches for you!");
  });

  it("processes a non-string utterance as empty text", async () => {
    const res = await request(buildApp())
      .post("/api/conversations/c-1/turns")
      .send({ utterance: 123 });
    expect(res.status).toBe(200);
    expect(res.body.data.score).toBe(50);
    expect(res.body.data.signals.tags).toEqual([]);
  });

  it("rejects an invalid conversation id", async () => {
    const res = await request(buildApp())
      .post("/api/conversations/bad%20id/turns")
      .send({ utterance: "hello" });
    expect(res.status).toBe(400);
    expect(res.body.message).toBe("Invalid conversation id");
  });

  it("returns 503 when the catalog is unavailable", async () => {
    const res = await request(
      buildApp({
        queryProducts: async () => {
          throw new StoreUnavailableError("catalog", "Catalog query failed: timeout");
        },
      })
    )
      .post("/api/conversations/c-1/turns")
      .send({ utterance: "vegan" });
    expect(res.status).toBe(503);
    expect(res.body.error).toEqual({
      kind: "CATALOG_UNAVAILABLE",
      message: "Catalog query failed: timeout",
    });
  });

  it("GET and DELETE report unknown conversations", async () => {
    const app = buildApp();
    expect((await request(app).get("/api/conversations/nope")).status).toBe(404);
    expect((await request(app).delete("/api/conversations/nope")).status).toBe(404);

    await request(app).post("/api/conversations/c-9/turns").send({ utterance: "hi" });
    expect((await request(app).delete("/api/conversations/c-9")).status).toBe(204);
    expect((await request(app).get("/api/conversations/c-9")).status).toBe(404);
  });

  it("answers malformed JSON with 400", async () => {
    const res = await request(buildApp())
      .post("/api/conversations/c-1/turns")
      .set("Content-Type", "application/json")
      .send('{"utterance":');
    expect(res.status).toBe(400);
  });
});

describe("Catalog API", () => {
  it("GET /api/products filters by price, tags and category", async () => {
    const app = buildApp();
    const cheap = await request(app).get("/api/products?maxPrice=10");
    expect(cheap.status).toBe(200);
    expect(cheap.body.data.map((p: { id: number }) => p.id)).toEqual([1]);

    const spicy = await request(app).get("/api/products?tags=spicy,vegan");
    expect(spicy.body.meta.total).toBe(2);

    const burgers = await request(app).get("/api/products?category=burgers");
    expect(burgers.body.data.map((p: { id: number }) => p.id)).toEqual([2]);
  });

  it("rejects a non-numeric price", async () => {
    const res = await request(buildApp()).get("/api/products?maxPrice=cheap");
    expect(res.status).toBe(400);
  });

  it("GET /api/healthz", async () => {
    const res = await request(buildApp()).get("/api/healthz");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, activeConversations: 0 });
  });
});
