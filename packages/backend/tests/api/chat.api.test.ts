import express from "express";
import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";
import { createChatRouter } from "../../src/routes/chat.js";
import { ChatService } from "../../src/services/ChatService.js";
import { InMemoryChatStore } from "../../src/services/InMemoryChatStore.js";
import { RetrievalService } from "../../src/services/RetrievalService.js";
import { FakeEmbeddingService } from "../helpers/FakeEmbeddingService.js";
import { FakeLLMService } from "../helpers/FakeLLMService.js";
import { FakeSupplyChainStore } from "../helpers/FakeSupplyChainStore.js";

async function seedGraph(store: FakeSupplyChainStore): Promise<void> {
  await store.upsertProduct({
    id: "p3",
    name: "Smartphone X",
    description: "Flagship smartphone",
    price: 899,
    category: "Phones",
    descriptionEmbedding: [0, 1]
  });
  await store.upsertSuppliers([
    { id: "s2", name: "Mobile Components Ltd", location: "Taipei", specialization: "Mobile" }
  ]);
  await store.mergeSupplies({ supplier_id: "s2", product_id: "p3", warehouse_id: "w1" });
}

describe("chat api", () => {
  let store: FakeSupplyChainStore;
  let llm: FakeLLMService;
  let app: ReturnType<typeof express>;
  let connectCalls: number;

  beforeEach(async () => {
    store = new FakeSupplyChainStore();
    await seedGraph(store);
    llm = new FakeLLMService((context) =>
      context.includes("Mobile Components Ltd")
        ? "Mobile Components Ltd supplies the Smartphone X."
        : "I don't know."
    );
    connectCalls = 0;

    const chatService = new ChatService(
      new InMemoryChatStore(),
      new RetrievalService(store, new FakeEmbeddingService({}, [0, 1]), 3),
      llm
    );

    app = express();
    app.use(express.json());
    app.use(
      "/api/chat",
      createChatRouter({
        chatService,
        ensureStoreConnected: async () => {
          connectCalls += 1;
        }
      })
    );
  });

  it("supports session CRUD and a question round trip", async () => {
    const createSessionResponse = await request(app).post("/api/chat/sessions").send({ title: "Phones" });
    expect(createSessionResponse.status).toBe(201);
    expect(createSessionResponse.body.session.state).toBe("awaiting_input");
    const sessionId = createSessionResponse.body.session.id as string;

    const listResponse = await request(app).get("/api/chat/sessions");
    expect(listResponse.status).toBe(200);
    expect(listResponse.body.sessions).toHaveLength(1);

    const messageResponse = await request(app)
      .post(`/api/chat/sessions/${sessionId}/messages`)
      .send({ content: "  Which suppliers provide smartphones?  " });
    expect(messageResponse.status).toBe(201);
    expect(messageResponse.body.sessionId).toBe(sessionId);
    expect(messageResponse.body.message.role).toBe("assistant");
    expect(messageResponse.body.message.content).toBe("Mobile Components Ltd supplies the Smartphone X.");
    expect(llm.calls[0]?.question).toBe("Which suppliers provide smartphones?");
    expect(connectCalls).toBe(1);

    const detailResponse = await request(app).get(`/api/chat/sessions/${sessionId}`);
    expect(detailResponse.status).toBe(200);
    expect(detailResponse.body.session.messages).toHaveLength(2);
    expect(detailResponse.body.session.messages[0].content).toBe("Which suppliers provide smartphones?");
    expect(detailResponse.body.session.messages[1].role).toBe("assistant");

    const deleteResponse = await request(app).delete(`/api/chat/sessions/${sessionId}`);
    expect(deleteResponse.status).toBe(204);

    const detailAfterDeleteResponse = await request(app).get(`/api/chat/sessions/${sessionId}`);
    expect(detailAfterDeleteResponse.status).toBe(404);
  });

  it("defaults the session title", async () => {
    const response = await request(app).post("/api/chat/sessions").send({});

    expect(response.status).toBe(201);
    expect(response.body.session.title).toBe("New Session");
  });

  it("rejects blank questions", async () => {
    const session = await request(app).post("/api/chat/sessions").send({ title: "Blank" });

    const response = await request(app)
      .post(`/api/chat/sessions/${session.body.session.id as string}/messages`)
      .send({ content: "   " });

    expect(response.status).toBe(400);
    expect(response.body.error).toBe("Validation failed");
    expect(response.body.details[0].path).toBe("body.content");
    expect(llm.calls).toHaveLength(0);
  });

  it("returns 404 for questions to an unknown session", async () => {
    const response = await request(app)
      .post("/api/chat/sessions/does-not-exist/messages")
      .send({ content: "What products are available?" });

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: "Session not found" });
  });

  it("completes the turn with the error sentinel context when the store is unreachable", async () => {
    const chatService = new ChatService(
      new InMemoryChatStore(),
      new RetrievalService(store, null, 3),
      llm
    );
    const degradedApp = express();
    degradedApp.use(express.json());
    degradedApp.use(
      "/api/chat",
      createChatRouter({
        chatService,
        ensureStoreConnected: async () => {
          throw new Error("ServiceUnavailable");
        }
      })
    );

    const session = await request(degradedApp).post("/api/chat/sessions").send({ title: "Offline" });
    const response = await request(degradedApp)
      .post(`/api/chat/sessions/${session.body.session.id as string}/messages`)
      .send({ content: "What products are available?" });

    expect(response.status).toBe(201);
    expect(response.body.message.content).toBe("I don't know.");
    expect(llm.calls[0]?.context).toBe("Error retrieving context.");
  });

  it("returns 404 when the session is deleted before the answer is stored", async () => {
    let sessionId = "";
    const chatService: ChatService = new ChatService(
      new InMemoryChatStore(),
      new RetrievalService(store, new FakeEmbeddingService({}, [0, 1]), 3),
      new FakeLLMService(() => {
        chatService.deleteSession(sessionId);
        return "Unused answer.";
      })
    );
    const racingApp = express();
    racingApp.use(express.json());
    racingApp.use(
      "/api/chat",
      createChatRouter({
        chatService,
        ensureStoreConnected: async () => undefined
      })
    );

    const session = await request(racingApp).post("/api/chat/sessions").send({ title: "Deleted mid-turn" });
    sessionId = session.body.session.id as string;
    const response = await request(racingApp)
      .post(`/api/chat/sessions/${sessionId}/messages`)
      .send({ content: "What products are available?" });

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: "Session not found" });
  });
});
