/**
 * Genie API Client
 *
 * Purpose:
 * Low-level client for the Databricks Genie conversation API and the SQL
 * Statement Execution API. Handles authentication, response validation,
 * completion polling and retries for idempotent reads.
 *
 * POST calls (start conversation, create message) are never retried: the API
 * takes no idempotency key, so a repeat could add a duplicate turn.
 *
 * Layer: Genie (API client)
 */

import { z } from "zod";
import {
  databricksErrorBodySchema,
  genieMessageSchema,
  messageQueryResultSchema,
  resultChunkSchema,
  startConversationResponseSchema,
  statementResponseSchema,
  type GenieMessage,
  type MessageQueryResult,
  type ResultChunk,
  type ResultColumn,
  type ScalarValue,
  type StatementResponse,
} from "@shared/schema";
import { GENIE_CONSTANTS } from "../config/constants";
import { ExternalServiceError } from "../utils/errorHandler";
import { logDebug, logWarn } from "../utils/logger";

const SERVICE = "Genie";
const FAILED_STATUSES: ReadonlySet<string> = new Set(GENIE_CONSTANTS.FAILED_STATUSES);
const FAILED_STATEMENT_STATES: ReadonlySet<string> = new Set(["FAILED", "CANCELED", "CLOSED"]);

export class GenieApiError extends ExternalServiceError {
  httpStatus: number;
  errorCode?: string;
  constructor(message: string, httpStatus: number, errorCode?: string) {
    super(SERVICE, message);
    this.name = "GenieApiError";
    this.httpStatus = httpStatus;
    this.errorCode = errorCode;
  }
}

export class GenieMessageFailedError extends ExternalServiceError {
  messageStatus: string;
  constructor(messageStatus: string, detail?: string) {
    super(SERVICE, `message ended with status ${messageStatus}${detail ? `: ${detail}` : ""}`);
    this.name = "GenieMessageFailedError";
    this.messageStatus = messageStatus;
  }
}

export class GenieStatementFailedError extends ExternalServiceError {
  statementState: string;
  constructor(statementId: string, statementState: string) {
    super(SERVICE, `statement ${statementId} ended with state ${statementState}`);
    this.name = "GenieStatementFailedError";
    this.statementState = statementState;
  }
}

export class GenieTimeoutError extends ExternalServiceError {
  constructor(messageId: string, timeoutMs: number) {
    super(SERVICE, `message ${messageId} did not complete within ${timeoutMs}ms`);
    this.name = "GenieTimeoutError";
  }
}

export type StatementResult = {
  columns: ResultColumn[];
  rows: ScalarValue[][];
};

/**
 * The Genie operations the orchestrator depends on.
 */
export interface GenieApi {
  startConversationAndWait(spaceId: string, content: string): Promise<GenieMessage>;
  createMessageAndWait(spaceId: string, conversationId: string, content: string): Promise<GenieMessage>;
  getMessage(spaceId: string, conversationId: string, messageId: string): Promise<GenieMessage>;
  getMessageQueryResult(spaceId: string, conversationId: string, messageId: string): Promise<MessageQueryResult>;
  getStatementResult(statementId: string): Promise<StatementResult>;
}

export type GenieClientOptions = {
  host: string;
  token: string;
  waitTimeoutMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  random?: () => number;
};

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function isRetryableRead(error: unknown): boolean {
  if (error instanceof GenieApiError) {
    return error.httpStatus === 429 || error.httpStatus >= 500;
  }
  // fetch rejects with a TypeError on network failure
  return error instanceof TypeError;
}

export class GenieClient implements GenieApi {
  private baseUrl: string;
  private token: string;
  private waitTimeoutMs: number;
  private fetchImpl: typeof fetch;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;
  private random: () => number;

  constructor(options: GenieClientOptions) {
    const host = options.host.replace(/\/+$/, "");
    this.baseUrl = /^https?:\/\//.test(host) ? host : `https://${host}`;
    this.token = options.token;
    this.waitTimeoutMs = options.waitTimeoutMs ?? GENIE_CONSTANTS.DEFAULT_WAIT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  async startConversationAndWait(spaceId: string, content: string): Promise<GenieMessage> {
    const started = await this.request(
      "POST",
      `/api/2.0/genie/spaces/${encodeURIComponent(spaceId)}/start-conversation`,
      startConversationResponseSchema,
      { content },
    );
    logDebug(`[Genie] Started conversation ${started.conversation_id}`, {
      conversationId: started.conversation_id,
    });
    return this.waitForMessage(spaceId, started.conversation_id, started.message_id, started.message);
  }

  async createMessageAndWait(spaceId: string, conversationId: string, content: string): Promise<GenieMessage> {
    const created = await this.request(
      "POST",
      `${this.conversationPath(spaceId, conversationId)}/messages`,
      genieMessageSchema,
      { content },
    );
    return this.waitForMessage(spaceId, conversationId, created.id, created);
  }

  getMessage(spaceId: string, conversationId: string, messageId: string): Promise<GenieMessage> {
    return this.readWithRetry(() =>
      this.request(
        "GET",
        `${this.conversationPath(spaceId, conversationId)}/messages/${encodeURIComponent(messageId)}`,
        genieMessageSchema,
      ),
    );
  }

  getMessageQueryResult(spaceId: string, conversationId: string, messageId: string): Promise<MessageQueryResult> {
    return this.readWithRetry(() =>
      this.request(
        "GET",
        `${this.conversationPath(spaceId, conversationId)}/messages/${encodeURIComponent(messageId)}/query-result`,
        messageQueryResultSchema,
      ),
    );
  }

  getStatement(statementId: string): Promise<StatementResponse> {
    return this.readWithRetry(() =>
      this.request("GET", `/api/2.0/sql/statements/${encodeURIComponent(statementId)}`, statementResponseSchema),
    );
  }

  getStatementResultChunk(statementId: string, chunkIndex: number): Promise<ResultChunk> {
    return this.readWithRetry(() =>
      this.request(
        "GET",
        `/api/2.0/sql/statements/${encodeURIComponent(statementId)}/result/chunks/${chunkIndex}`,
        resultChunkSchema,
      ),
    );
  }

  /**
   * Column schema plus every row of a statement, following result chunks.
   */
  async getStatementResult(statementId: string): Promise<StatementResult> {
    const statement = await this.getStatement(statementId);
    const state = statement.status?.state;
    if (state && FAILED_STATEMENT_STATES.has(state)) {
      throw new GenieStatementFailedError(statementId, state);
    }

    const columns = (statement.manifest?.schema?.columns ?? [])
      .slice()
      .sort((a, b) => (a.position ?? 0) - (b.position ?? 0))
      .map(col => ({ name: col.name, typeName: col.type_name }));

    const rows: ScalarValue[][] = [...(statement.result?.data_array ?? [])];
    let nextChunk = statement.result?.next_chunk_index;
    let fetched = 0;

    while (nextChunk !== undefined && nextChunk !== null) {
      if (fetched >= GENIE_CONSTANTS.MAX_RESULT_CHUNKS) {
        logWarn(`[Genie] Statement ${statementId} has more chunks than fetched; result truncated`, {
          chunksFetched: fetched,
        });
        break;
      }
      const chunk = await this.getStatementResultChunk(statementId, nextChunk);
      rows.push(...(chunk.data_array ?? []));
      nextChunk = chunk.next_chunk_index;
      fetched++;
    }

    return { columns, rows };
  }

  /**
   * Poll a message until Genie reports it COMPLETED.
   * Delay grows one step per attempt up to a cap, plus jitter.
   */
  async waitForMessage(
    spaceId: string,
    conversationId: string,
    messageId: string,
    initial?: GenieMessage,
  ): Promise<GenieMessage> {
    const deadline = this.now() + this.waitTimeoutMs;
    let message = initial;
    let attempt = 0;

    while (true) {
      if (message) {
        const status = message.status;
        if (status === GENIE_CONSTANTS.COMPLETED_STATUS) {
          return message;
        }
        if (status && FAILED_STATUSES.has(status)) {
          throw new GenieMessageFailedError(status, message.error?.error);
        }
        attempt++;
        const delay =
          Math.min(attempt * GENIE_CONSTANTS.POLL_STEP_MS, GENIE_CONSTANTS.MAX_POLL_DELAY_MS) +
          Math.floor(this.random() * GENIE_CONSTANTS.POLL_JITTER_MS);
        if (this.now() + delay > deadline) {
          throw new GenieTimeoutError(messageId, this.waitTimeoutMs);
        }
        logDebug(`[Genie] Message ${messageId} is ${status ?? "pending"}; polling again in ${delay}ms`);
        await this.sleep(delay);
      }
      message = await this.getMessage(spaceId, conversationId, messageId);
    }
  }

  private conversationPath(spaceId: string, conversationId: string): string {
    return `/api/2.0/genie/spaces/${encodeURIComponent(spaceId)}/conversations/${encodeURIComponent(conversationId)}`;
  }

  private async readWithRetry<T>(operation: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (attempt >= GENIE_CONSTANTS.READ_MAX_ATTEMPTS || !isRetryableRead(error)) {
          throw error;
        }
        // Full jitter: anywhere between 0 and the exponential ceiling
        const delay = Math.floor(this.random() * GENIE_CONSTANTS.READ_RETRY_BASE_MS * 2 ** (attempt - 1));
        logWarn(`[Genie] Read failed (attempt ${attempt}); retrying in ${delay}ms`, {
          error: error instanceof Error ? error.message : String(error),
        });
        await this.sleep(delay);
      }
    }
  }

  private async request<S extends z.ZodTypeAny>(
    method: "GET" | "POST",
    path: string,
    schema: S,
    body?: unknown,
  ): Promise<z.infer<S>> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: {
        Authorization: `Bearer ${this.token}`,
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    const raw: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      const parsedError = databricksErrorBodySchema.safeParse(raw);
      const errorBody = parsedError.success ? parsedError.data : {};
      throw new GenieApiError(
        `${method} ${path} failed with ${response.status}: ${errorBody.message || response.statusText}`,
        response.status,
        errorBody.error_code,
      );
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new GenieApiError(
        `${method} ${path} returned an unexpected body: ${parsed.error.message}`,
        response.status,
        "MALFORMED_RESPONSE",
      );
    }
    return parsed.data;
  }
}
