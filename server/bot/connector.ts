/**
 * Bot Framework Connector
 *
 * Purpose:
 * Bridges the HTTP route to the Bot Framework CloudAdapter, which verifies
 * the channel's Authorization token and provides the turn context used to
 * send replies. Turn logic lives in MessageHandler; this file only adapts
 * types in both directions.
 *
 * Layer: Bot (transport integration)
 */

import botbuilder from "botbuilder";
import type { Request as BotRequest, Response as BotResponse, TurnContext } from "botbuilder";
import type { ActivityEnvelope, Block, RenderedReply } from "@shared/schema";
import type { AppConfig } from "../config/env";
import type { MessageHandler, TurnReplier } from "./messageHandler";

const { CloudAdapter, ConfigurationBotFrameworkAuthentication, ActivityTypes } = botbuilder;

export type ProcessOutcome = {
  status: number;
  body?: unknown;
};

/**
 * Authenticates an inbound activity and runs it through the bot.
 */
export interface ActivityProcessor {
  process(activity: ActivityEnvelope, authHeader: string): Promise<ProcessOutcome>;
}

/**
 * Captures what the adapter writes so the route decides the final HTTP
 * response (201 for plain acks, no error detail on failures).
 */
class CapturedResponse implements BotResponse {
  socket: unknown = null;
  statusCode = 200;
  body: unknown = undefined;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  header(_name: string, _value: unknown): this {
    return this;
  }

  setHeader(_name: string, _value: unknown): this {
    return this;
  }

  send(body?: unknown): this {
    this.body = body;
    return this;
  }

  end(): this {
    return this;
  }
}

function blocksFallbackText(blocks: Block[]): string {
  return blocks
    .map(block => (block.type === "section" ? block.text.text : ""))
    .filter(Boolean)
    .join("\n");
}

/**
 * A plain ack becomes 201; adapter error bodies are dropped so no internal
 * detail reaches the caller.
 */
export function toProcessOutcome(statusCode: number, body: unknown): ProcessOutcome {
  if (body !== undefined && body !== null && statusCode < 400) {
    return { status: statusCode, body };
  }
  if (statusCode === 200) {
    return { status: 201 };
  }
  return { status: statusCode };
}

export function createTurnReplier(context: Pick<TurnContext, "sendActivity">): TurnReplier {
  return {
    async send(reply: RenderedReply): Promise<void> {
      if (reply.type === "blocks") {
        await context.sendActivity({
          type: ActivityTypes.Message,
          text: blocksFallbackText(reply.blocks),
          channelData: { blocks: reply.blocks },
        });
        return;
      }
      await context.sendActivity({ type: ActivityTypes.Message, text: reply.text });
    },
  };
}

export class BotFrameworkConnector implements ActivityProcessor {
  private adapter: InstanceType<typeof CloudAdapter>;

  constructor(
    config: Pick<
      AppConfig,
      "MICROSOFT_APP_ID" | "MICROSOFT_APP_PASSWORD" | "MICROSOFT_APP_TYPE" | "MICROSOFT_APP_TENANT_ID"
    >,
    private handler: MessageHandler,
  ) {
    const auth = new ConfigurationBotFrameworkAuthentication({
      MicrosoftAppId: config.MICROSOFT_APP_ID,
      MicrosoftAppPassword: config.MICROSOFT_APP_PASSWORD,
      MicrosoftAppType: config.MICROSOFT_APP_TYPE,
      MicrosoftAppTenantId: config.MICROSOFT_APP_TENANT_ID,
    });
    this.adapter = new CloudAdapter(auth);
  }

  async process(activity: ActivityEnvelope, authHeader: string): Promise<ProcessOutcome> {
    const request: BotRequest = {
      body: activity,
      headers: { authorization: authHeader },
      method: "POST",
    };
    const response = new CapturedResponse();

    await this.adapter.process(request, response, (context: TurnContext) =>
      this.handler.onTurn(context.activity, createTurnReplier(context)),
    );

    return toProcessOutcome(response.statusCode, response.body);
  }
}
