/**
 * Conversation Orchestrator
 *
 * Purpose:
 * Runs one question through Genie and normalizes whatever comes back into an
 * AnswerPayload: a table (statement result), a text attachment, or the raw
 * message content.
 *
 * Key Flows:
 * 1. Start a conversation, or post a follow-up on the caller's thread
 * 2. Fetch the query result (when attached) and the full message
 * 3. Statement present -> tabular; text attachment -> message; else content
 * 4. Any failure -> error payload with a generic detail; the thread id is
 *    still returned so the session is not lost
 *
 * Layer: Genie (orchestration)
 */

import type { AnswerPayload, GenieAttachment, GenieMessage } from "@shared/schema";
import { USER_MESSAGES } from "../config/constants";
import { RequestLogger } from "../utils/logger";
import type { GenieApi } from "./client";

export type ResolveResult = {
  payload: AnswerPayload;
  /** Genie conversation id to store for the next turn (absent only if none was ever obtained). */
  threadId?: string;
};

/**
 * Anything that turns a question (plus optional thread) into an answer.
 * The message handler depends on this, not on Genie directly.
 */
export interface AnswerResolver {
  resolve(question: string, threadId?: string, logger?: RequestLogger): Promise<ResolveResult>;
}

function findQueryDescription(attachments: GenieAttachment[]): string {
  for (const attachment of attachments) {
    if (attachment.query?.description) {
      return attachment.query.description;
    }
  }
  return "";
}

function findAttachmentText(attachments: GenieAttachment[]): string | null {
  for (const attachment of attachments) {
    if (attachment.text?.content) {
      return attachment.text.content;
    }
  }
  return null;
}

export class ConversationOrchestrator implements AnswerResolver {
  constructor(
    private genie: GenieApi,
    private spaceId: string,
  ) {}

  async resolve(question: string, threadId?: string, logger = new RequestLogger()): Promise<ResolveResult> {
    let resolvedThreadId = threadId;

    try {
      logger.startStage("genie_message");
      const initial: GenieMessage = threadId
        ? await this.genie.createMessageAndWait(this.spaceId, threadId, question)
        : await this.genie.startConversationAndWait(this.spaceId, question);
      resolvedThreadId = initial.conversation_id;
      logger.info("Genie message completed", {
        stage: "genie_message",
        conversationId: resolvedThreadId,
        followUp: Boolean(threadId),
        stageMs: logger.endStage("genie_message"),
      });

      const queryResult = initial.query_result
        ? await this.genie.getMessageQueryResult(this.spaceId, initial.conversation_id, initial.id)
        : null;

      const message = await this.genie.getMessage(this.spaceId, initial.conversation_id, initial.id);
      const attachments = message.attachments ?? [];

      const statementId = queryResult?.statement_response?.statement_id;
      if (statementId) {
        logger.startStage("statement");
        const { columns, rows } = await this.genie.getStatementResult(statementId);
        logger.info("Statement result fetched", {
          stage: "statement",
          rowCount: rows.length,
          columnCount: columns.length,
          stageMs: logger.endStage("statement"),
        });

        const description = findQueryDescription(attachments);
        return {
          payload: {
            kind: "tabular",
            columns,
            rows,
            ...(description ? { description } : {}),
          },
          threadId: resolvedThreadId,
        };
      }

      const attachmentText = findAttachmentText(attachments);
      if (attachmentText !== null) {
        return { payload: { kind: "message", text: attachmentText }, threadId: resolvedThreadId };
      }

      return { payload: { kind: "message", text: message.content }, threadId: resolvedThreadId };
    } catch (error) {
      logger.error("Error resolving question with Genie", error, { conversationId: resolvedThreadId });
      return {
        payload: { kind: "error", detail: USER_MESSAGES.GENERIC_FAILURE },
        threadId: resolvedThreadId,
      };
    }
  }
}
