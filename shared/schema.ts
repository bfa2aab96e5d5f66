import { sql } from "drizzle-orm";
import { pgTable, varchar, timestamp } from "drizzle-orm/pg-core";
import { z } from "zod";

// Sessions: chat user -> Genie conversation
export const genieSessions = pgTable("genie_sessions", {
  userId: varchar("user_id").primaryKey(),
  conversationId: varchar("conversation_id").notNull(),
  updatedAt: timestamp("updated_at").default(sql`now()`).notNull(),
});

export type GenieSession = typeof genieSessions.$inferSelect;

// ---------------------------------------------------------------------------
// Answer payloads (normalized result of one Genie turn)
// ---------------------------------------------------------------------------

export const scalarValueSchema = z.union([z.string(), z.number(), z.null()]);
export type ScalarValue = z.infer<typeof scalarValueSchema>;

export const resultColumnSchema = z.object({
  name: z.string(),
  typeName: z.string(),
});
export type ResultColumn = z.infer<typeof resultColumnSchema>;

export const tabularAnswerSchema = z.object({
  kind: z.literal("tabular"),
  columns: z.array(resultColumnSchema),
  rows: z.array(z.array(scalarValueSchema)),
  description: z.string().optional(),
});

export const messageAnswerSchema = z.object({
  kind: z.literal("message"),
  text: z.string(),
});

export const errorAnswerSchema = z.object({
  kind: z.literal("error"),
  detail: z.string(),
});

export const answerPayloadSchema = z.discriminatedUnion("kind", [
  tabularAnswerSchema,
  messageAnswerSchema,
  errorAnswerSchema,
]);

export type TabularAnswer = z.infer<typeof tabularAnswerSchema>;
export type MessageAnswer = z.infer<typeof messageAnswerSchema>;
export type ErrorAnswer = z.infer<typeof errorAnswerSchema>;
export type AnswerPayload = z.infer<typeof answerPayloadSchema>;

// ---------------------------------------------------------------------------
// Rendered replies (Slack Block Kit subset + plain text)
// ---------------------------------------------------------------------------

export type SectionBlock = {
  type: "section";
  text: { type: "mrkdwn"; text: string };
};

export type DividerBlock = { type: "divider" };

export type Block = SectionBlock | DividerBlock;

export type RenderedReply =
  | { type: "plain_text"; text: string }
  | { type: "blocks"; blocks: Block[] };

// ---------------------------------------------------------------------------
// Genie REST wire shapes
// ---------------------------------------------------------------------------

export const genieAttachmentSchema = z.object({
  attachment_id: z.string().optional(),
  text: z
    .object({
      id: z.string().optional(),
      content: z.string().optional(),
    })
    .nullish(),
  query: z
    .object({
      title: z.string().optional(),
      description: z.string().optional(),
      query: z.string().optional(),
    })
    .nullish(),
});
export type GenieAttachment = z.infer<typeof genieAttachmentSchema>;

export const genieMessageSchema = z.object({
  id: z.string(),
  conversation_id: z.string(),
  space_id: z.string().optional(),
  content: z.string().default(""),
  status: z.string().optional(),
  attachments: z.array(genieAttachmentSchema).nullish(),
  query_result: z
    .object({
      statement_id: z.string().optional(),
      row_count: z.number().optional(),
    })
    .nullish(),
  error: z
    .object({
      error: z.string().optional(),
      type: z.string().optional(),
    })
    .nullish(),
});
export type GenieMessage = z.infer<typeof genieMessageSchema>;

export const startConversationResponseSchema = z.object({
  conversation_id: z.string(),
  message_id: z.string(),
  message: genieMessageSchema.optional(),
});
export type StartConversationResponse = z.infer<typeof startConversationResponseSchema>;

export const statementColumnSchema = z.object({
  name: z.string(),
  type_name: z.string().default("STRING"),
  position: z.number().optional(),
});

export const resultChunkSchema = z.object({
  chunk_index: z.number().optional(),
  row_count: z.number().optional(),
  data_array: z.array(z.array(scalarValueSchema)).nullish(),
  next_chunk_index: z.number().nullish(),
});
export type ResultChunk = z.infer<typeof resultChunkSchema>;

export const statementResponseSchema = z.object({
  statement_id: z.string(),
  status: z.object({ state: z.string() }).optional(),
  manifest: z
    .object({
      schema: z
        .object({
          columns: z.array(statementColumnSchema).default([]),
        })
        .optional(),
      total_chunk_count: z.number().optional(),
    })
    .nullish(),
  result: resultChunkSchema.nullish(),
});
export type StatementResponse = z.infer<typeof statementResponseSchema>;

export const messageQueryResultSchema = z.object({
  statement_response: statementResponseSchema.nullish(),
});
export type MessageQueryResult = z.infer<typeof messageQueryResultSchema>;

export const databricksErrorBodySchema = z.object({
  error_code: z.string().optional(),
  message: z.string().optional(),
});

// ---------------------------------------------------------------------------
// Inbound Bot Framework activity envelope
// ---------------------------------------------------------------------------

export const channelAccountSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
  })
  .passthrough();

export const activityEnvelopeSchema = z
  .object({
    type: z.string().min(1, "Activity type is required"),
    id: z.string().optional(),
    channelId: z.string().optional(),
    serviceUrl: z.string().optional(),
    text: z.string().nullish(),
    from: channelAccountSchema.optional(),
    recipient: channelAccountSchema.optional(),
    conversation: z.object({ id: z.string() }).passthrough().optional(),
    membersAdded: z.array(channelAccountSchema).optional(),
  })
  .passthrough();
export type ActivityEnvelope = z.infer<typeof activityEnvelopeSchema>;
