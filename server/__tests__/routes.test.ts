import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import request from "supertest";
import { createApp } from "../app";
import type { ActivityProcessor } from "../bot/connector";

const activity = {
  type: "message",
  id: "act-1",
  channelId: "msteams",
  serviceUrl: "https://smba.example.com/",
  text: "How many orders?",
  from: { id: "U1", name: "Test User" },
  recipient: { id: "bot-1" },
  conversation: { id: "conv-1" },
};

describe("POST /api/messages", () => {
  let processor: { process: Mock<ActivityProcessor["process"]> };

  beforeEach(() => {
    processor = { process: vi.fn<ActivityProcessor["process"]>() };
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rejects non-JSON bodies with 415", async () => {
    const res = await request(createApp({ processor }))
      .post("/api/messages")
      .set("Content-Type", "text/plain")
      .send("hello");

    expect(res.status).toBe(415);
    expect(res.body).toEqual({ error: "Unsupported content type: text/plain" });
    expect(processor.process).not.toHaveBeenCalled();
  });

  it("rejects an activity without a type", async () => {
    const res = await request(createApp({ processor }))
      .post("/api/messages")
      .send({ text: "hi" });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "type: Required" });
    expect(processor.process).not.toHaveBeenCalled();
  });

  it("rejects malformed JSON with 400", async () => {
    const res = await request(createApp({ processor }))
      .post("/api/messages")
      .set("Content-Type", "application/json")
      .send('{"type":');

    expect(res.status).toBe(400);
    expect(processor.process).not.toHaveBeenCalled();
  });

  it("hands the activity and Authorization header to the processor", async () => {
    processor.process.mockResolvedValue({ status: 201 });

    const res = await request(createApp({ processor }))
      .post("/api/messages")
      .set("Authorization", "Bearer test-secret")
      .send(activity);

    expect(res.status).toBe(201);
    expect(res.text).toBe("");
    expect(processor.process).toHaveBeenCalledWith(expect.objectContaining(activity), "Bearer test-secret");
  });

  it("passes an empty Authorization header through when none is sent", async () => {
    processor.process.mockResolvedValue({ status: 401 });

    const res = await request(createApp({ processor })).post("/api/messages").send(activity);

    expect(res.status).toBe(401);
    expect(processor.process).toHaveBeenCalledWith(expect.objectContaining({ type: "message" }), "");
  });

  it("returns the processor's body as JSON", async () => {
    processor.process.mockResolvedValue({ status: 200, body: { id: "reply-1" } });

    const res = await request(createApp({ processor })).post("/api/messages").send(activity);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ id: "reply-1" });
  });

  it("returns an empty 500 when processing throws", async () => {
    processor.process.mockRejectedValue(new Error("adapter exploded"));

    const res = await request(createApp({ processor })).post("/api/messages").send(activity);

    expect(res.status).toBe(500);
    expect(res.text).toBe("");
  });
});

describe("GET /api/health", () => {
  it("reports ok with security headers", async () => {
    const app = createApp({ processor: { process: vi.fn<ActivityProcessor["process"]>() } });

    const res = await request(app).get("/api/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok" });
    expect(res.headers["x-content-type-options"]).toBe("nosniff");
    expect(res.headers["x-powered-by"]).toBeUndefined();
  });
});
