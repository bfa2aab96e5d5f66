import type { AnswerPayload, RenderedReply } from "@shared/schema";
import { RENDER_CONSTANTS } from "../config/constants";
import { renderBlocks } from "./blocks";
import { renderPlain } from "./plainText";

export { renderBlocks } from "./blocks";
export { renderPlain } from "./plainText";
export { formatCell } from "./valueFormatter";

/**
 * Pick the renderer for a channel: Slack gets Block Kit, every other
 * channel gets plain text.
 */
export function renderForChannel(payload: AnswerPayload, channelId: string | undefined): RenderedReply {
  if (channelId === RENDER_CONSTANTS.BLOCKS_CHANNEL) {
    return { type: "blocks", blocks: renderBlocks(payload) };
  }
  return { type: "plain_text", text: renderPlain(payload) };
}
