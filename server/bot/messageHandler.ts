/**
 * Message Handler
 *
 * Purpose:
 * Per-turn control flow between the chat transport and Genie. Each inbound
 * message is handled independently:
 *
 *   received -> session_lookup -> orchestrator_call -> formatting -> replied
 *
 * with error_replied reachable from any state. Failures never propagate to
 * the transport; the user gets one of two fixed messages instead.
 *
 * Layer: Bot (turn handling)
 */

import { answerPayloadSchema, type AnswerPayload, type RenderedReply } from "@shared/schema";
import { USER_MESSAGES } from "../config/constants";
import { renderForChannel } from "../formatting";
import type { AnswerResolver } from "../genie/orchestrator";
import type { ISessionStore } from "../session/store";
import type { TurnSerializer } from "../session/turnSerializer";
import { classifyTurnError, PayloadDecodeError } from "../utils/errorHandler";
import { RequestLogger } from "../utils/logger";

export type ChatAccount = {
  id: string;
  name?: string;
};

/** The parts of an inbound activity the handler reads. */
export interface TurnActivity {
  type: string;
  text?: string | null;
  channelId?: string;
  from?: ChatAccount;
  recipient?: ChatAccount;
  membersAdded?: ChatAccount[];
}

export interface TurnReplier {
  send(reply: RenderedReply): Promise<void>;
}

export type TurnState =
  | "received"
  | "session_lookup"
  | "orchestrator_call"
  | "formatting"
  | "replied"
  | "error_replied";

export type MessageHandlerDeps = {
  resolver: AnswerResolver;
  sessions: ISessionStore;
  /** When set, a user's turns run one at a time. */
  serializer?: TurnSerializer;
};

export type TurnInput = {
  question: string;
  userId: string;
};

function cleanMention(text: string): string {
  return text.replace(/^<@\w+>\s*/, "").trim();
}

/**
 * Pull the question and user id out of an activity.
 * Throws PayloadDecodeError when either is missing.
 */
export function extractTurnInput(activity: TurnActivity): TurnInput {
  const question = cleanMention(activity.text ?? "");
  const userId = activity.from?.id ?? "";
  if (!question) {
    throw new PayloadDecodeError("Inbound message has no text");
  }
  if (!userId) {
    throw new PayloadDecodeError("Inbound message has no sender id");
  }
  return { question, userId };
}

/**
 * Error payloads carry a user-facing detail; show it as a plain message.
 */
function toDisplayPayload(payload: AnswerPayload): AnswerPayload {
  if (payload.kind === "error") {
    return { kind: "message", text: payload.detail };
  }
  return payload;
}

export class MessageHandler {
  private resolver: AnswerResolver;
  private sessions: ISessionStore;
  private serializer?: TurnSerializer;

  constructor(deps: MessageHandlerDeps) {
    this.resolver = deps.resolver;
    this.sessions = deps.sessions;
    this.serializer = deps.serializer;
  }

  /**
   * Entry point for every activity: messages go through the turn state
   * machine, member additions get a welcome.
   */
  async onTurn(activity: TurnActivity, replier: TurnReplier): Promise<void> {
    if (activity.type === "message") {
      await this.handleMessage(activity, replier);
    } else if (activity.type === "conversationUpdate" && activity.membersAdded?.length) {
      await this.handleMembersAdded(activity, replier);
    }
  }

  async handleMessage(activity: TurnActivity, replier: TurnReplier): Promise<TurnState> {
    const logger = new RequestLogger(activity.channelId, activity.from?.id);
    const turn: { state: TurnState } = { state: "received" };

    try {
      const input = extractTurnInput(activity);
      logger.info("Message received", { text: input.question.substring(0, 100) });

      const runTurn = () => this.runTurn(input, activity.channelId, replier, turn, logger);
      if (this.serializer) {
        await this.serializer.run(input.userId, runTurn);
      } else {
        await runTurn();
      }
      logger.info("Reply sent", { duration: logger.getDuration() });
      return turn.state;
    } catch (error) {
      const classified = classifyTurnError(error);
      logger.error(`Error processing message (state=${turn.state})`, error, { errorType: classified.type });
      try {
        await replier.send({ type: "plain_text", text: classified.userMessage });
      } catch (sendError) {
        logger.error("Failed to send error reply", sendError);
      }
      turn.state = "error_replied";
      return turn.state;
    }
  }

  /**
   * Welcome every newly added member except the bot itself.
   * Returns the number of welcomes sent.
   */
  async handleMembersAdded(activity: TurnActivity, replier: TurnReplier): Promise<number> {
    const botId = activity.recipient?.id;
    let sent = 0;
    for (const member of activity.membersAdded ?? []) {
      if (member.id !== botId) {
        await replier.send({ type: "plain_text", text: USER_MESSAGES.WELCOME });
        sent++;
      }
    }
    return sent;
  }

  private async runTurn(
    input: TurnInput,
    channelId: string | undefined,
    replier: TurnReplier,
    turn: { state: TurnState },
    logger: RequestLogger,
  ): Promise<void> {
    turn.state = "session_lookup";
    const threadId = await this.sessions.get(input.userId);

    turn.state = "orchestrator_call";
    const result = await this.resolver.resolve(input.question, threadId, logger);
    if (result.threadId) {
      // Stored even for error payloads so the next turn stays on this thread
      await this.sessions.put(input.userId, result.threadId);
    }

    turn.state = "formatting";
    const decoded = answerPayloadSchema.safeParse(result.payload);
    if (!decoded.success) {
      throw new PayloadDecodeError("Resolver returned a malformed answer payload", decoded.error);
    }
    const reply = renderForChannel(toDisplayPayload(decoded.data), channelId);

    await replier.send(reply);
    turn.state = "replied";
  }
}
