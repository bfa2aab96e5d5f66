import { describe, it, expect, vi } from "vitest";
import type { GenieMessage } from "@shared/schema";
import type { GenieApi } from "../genie/client";
import { ConversationOrchestrator } from "../genie/orchestrator";

function genieMessage(overrides: Partial<GenieMessage> = {}): GenieMessage {
  return {
    id: "m1",
    conversation_id: "c1",
    content: "How many orders?",
    status: "COMPLETED",
    ...overrides,
  };
}

function createFakeGenie() {
  return {
    startConversationAndWait: vi.fn<GenieApi["startConversationAndWait"]>(),
    createMessageAndWait: vi.fn<GenieApi["createMessageAndWait"]>(),
    getMessage: vi.fn<GenieApi["getMessage"]>(),
    getMessageQueryResult: vi.fn<GenieApi["getMessageQueryResult"]>(),
    getStatementResult: vi.fn<GenieApi["getStatementResult"]>(),
  } satisfies GenieApi;
}

describe("ConversationOrchestrator", () => {
  it("starts a new conversation and returns the text attachment", async () => {
    const genie = createFakeGenie();
    genie.startConversationAndWait.mockResolvedValue(genieMessage());
    genie.getMessage.mockResolvedValue(
      genieMessage({ attachments: [{ text: { content: "There were 42 orders today." } }] }),
    );
    const orchestrator = new ConversationOrchestrator(genie, "space-1");

    const result = await orchestrator.resolve("How many orders?");

    expect(result).toEqual({
      payload: { kind: "message", text: "There were 42 orders today." },
      threadId: "c1",
    });
    expect(genie.startConversationAndWait).toHaveBeenCalledWith("space-1", "How many orders?");
    expect(genie.createMessageAndWait).not.toHaveBeenCalled();
    expect(genie.getMessageQueryResult).not.toHaveBeenCalled();
    expect(genie.getMessage).toHaveBeenCalledWith("space-1", "c1", "m1");
  });

  it("posts a follow-up on an existing thread", async () => {
    const genie = createFakeGenie();
    genie.createMessageAndWait.mockResolvedValue(genieMessage({ id: "m2", conversation_id: "c7" }));
    genie.getMessage.mockResolvedValue(genieMessage({ id: "m2", conversation_id: "c7", content: "Same as before." }));
    const orchestrator = new ConversationOrchestrator(genie, "space-1");

    const result = await orchestrator.resolve("And yesterday?", "c7");

    expect(genie.createMessageAndWait).toHaveBeenCalledWith("space-1", "c7", "And yesterday?");
    expect(genie.startConversationAndWait).not.toHaveBeenCalled();
    expect(result.threadId).toBe("c7");
  });

  it("returns a table with the query description when a statement is attached", async () => {
    const genie = createFakeGenie();
    genie.startConversationAndWait.mockResolvedValue(genieMessage({ query_result: { statement_id: "st1" } }));
    genie.getMessageQueryResult.mockResolvedValue({ statement_response: { statement_id: "st1" } });
    genie.getMessage.mockResolvedValue(
      genieMessage({
        attachments: [
          { text: { content: "Here you go" } },
          { query: { description: "Orders by region", query: "SELECT region, count(*) FROM orders" } },
        ],
      }),
    );
    genie.getStatementResult.mockResolvedValue({
      columns: [
        { name: "region", typeName: "STRING" },
        { name: "orders", typeName: "BIGINT" },
      ],
      rows: [["East", "1200"]],
    });
    const orchestrator = new ConversationOrchestrator(genie, "space-1");

    const result = await orchestrator.resolve("Orders by region?");

    expect(genie.getStatementResult).toHaveBeenCalledWith("st1");
    expect(result).toEqual({
      payload: {
        kind: "tabular",
        columns: [
          { name: "region", typeName: "STRING" },
          { name: "orders", typeName: "BIGINT" },
        ],
        rows: [["East", "1200"]],
        description: "Orders by region",
      },
      threadId: "c1",
    });
  });

  it("leaves the description out when no attachment has one", async () => {
    const genie = createFakeGenie();
    genie.startConversationAndWait.mockResolvedValue(genieMessage({ query_result: { statement_id: "st1" } }));
    genie.getMessageQueryResult.mockResolvedValue({ statement_response: { statement_id: "st1" } });
    genie.getMessage.mockResolvedValue(genieMessage({ attachments: [{ query: { query: "SELECT 1" } }] }));
    genie.getStatementResult.mockResolvedValue({ columns: [{ name: "x", typeName: "INT" }], rows: [["1"]] });
    const orchestrator = new ConversationOrchestrator(genie, "space-1");

    const result = await orchestrator.resolve("One?");

    expect(result.payload.kind).toBe("tabular");
    expect(result.payload).not.toHaveProperty("description");
  });

  it("falls back to the text attachment when the query result has no statement", async () => {
    const genie = createFakeGenie();
    genie.startConversationAndWait.mockResolvedValue(genieMessage({ query_result: { row_count: 0 } }));
    genie.getMessageQueryResult.mockResolvedValue({ statement_response: null });
    genie.getMessage.mockResolvedValue(genieMessage({ attachments: [{ text: { content: "Nothing matched." } }] }));
    const orchestrator = new ConversationOrchestrator(genie, "space-1");

    const result = await orchestrator.resolve("Anything?");

    expect(genie.getStatementResult).not.toHaveBeenCalled();
    expect(result.payload).toEqual({ kind: "message", text: "Nothing matched." });
  });

  it("falls back to the message content when there are no attachments", async () => {
    const genie = createFakeGenie();
    genie.startConversationAndWait.mockResolvedValue(genieMessage());
    genie.getMessage.mockResolvedValue(genieMessage({ content: "Can you rephrase that?", attachments: null }));
    const orchestrator = new ConversationOrchestrator(genie, "space-1");

    const result = await orchestrator.resolve("hmm");

    expect(result.payload).toEqual({ kind: "message", text: "Can you rephrase that?" });
  });

  it("returns an error payload without a thread when the start call fails", async () => {
    const genie = createFakeGenie();
    genie.startConversationAndWait.mockRejectedValue(new Error("connection refused"));
    const orchestrator = new ConversationOrchestrator(genie, "space-1");

    const result = await orchestrator.resolve("How many orders?");

    expect(result).toEqual({
      payload: { kind: "error", detail: "An error occurred while processing your request." },
      threadId: undefined,
    });
  });

  it("keeps the new thread id when a later step fails", async () => {
    const genie = createFakeGenie();
    genie.startConversationAndWait.mockResolvedValue(genieMessage({ conversation_id: "c9" }));
    genie.getMessage.mockRejectedValue(new Error("timeout"));
    const orchestrator = new ConversationOrchestrator(genie, "space-1");

    const result = await orchestrator.resolve("How many orders?");

    expect(result.payload.kind).toBe("error");
    expect(result.threadId).toBe("c9");
  });

  it("keeps the caller's thread id when a follow-up fails", async () => {
    const genie = createFakeGenie();
    genie.createMessageAndWait.mockRejectedValue(new Error("Genie error: message ended with status FAILED"));
    const orchestrator = new ConversationOrchestrator(genie, "space-1");

    const result = await orchestrator.resolve("And yesterday?", "c7");

    expect(result).toEqual({
      payload: { kind: "error", detail: "An error occurred while processing your request." },
      threadId: "c7",
    });
  });
});
