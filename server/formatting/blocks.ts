/**
 * Slack Block Kit rendering.
 *
 * Tables are laid out as fixed-width text inside a code fence so columns line
 * up, and cut to fit Slack's per-section text limit.
 */

import type { AnswerPayload, Block, SectionBlock, TabularAnswer } from "@shared/schema";
import { RENDER_CONSTANTS, USER_MESSAGES } from "../config/constants";
import { displayLength, formatTableRows } from "./valueFormatter";

function section(text: string): SectionBlock {
  return { type: "section", text: { type: "mrkdwn", text } };
}

function padCell(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - displayLength(text)));
}

/**
 * Cut table text to the section limit, appending the marker only when cut.
 */
export function truncateTable(tableText: string): string {
  const chars = Array.from(tableText);
  if (chars.length <= RENDER_CONSTANTS.MAX_TABLE_CHARS) {
    return tableText;
  }
  return chars.slice(0, RENDER_CONSTANTS.MAX_TABLE_CHARS).join("") + RENDER_CONSTANTS.TRUNCATION_MARKER;
}

/**
 * Fixed-width table: every column padded to max(header, widest cell).
 */
export function layoutTable(headers: string[], rows: string[][]): string {
  const widths = headers.map(name => displayLength(name));
  for (const row of rows) {
    row.forEach((value, i) => {
      widths[i] = Math.max(widths[i], displayLength(value));
    });
  }

  const headerLine = headers.map((name, i) => padCell(name, widths[i])).join(" | ");
  const separatorLine = widths.map(width => "-".repeat(width)).join("-+-");
  let tableText = `${headerLine}\n${separatorLine}\n`;
  for (const row of rows) {
    tableText += row.map((value, i) => padCell(value, widths[i])).join(" | ") + "\n";
  }
  return tableText;
}

function renderTableBlocks(table: TabularAnswer): Block[] {
  const blocks: Block[] = [];

  if (table.description) {
    blocks.push(section(`*Query Description:*\n${table.description}`));
    blocks.push({ type: "divider" });
  }

  const rows = formatTableRows(table);
  if (rows === null) {
    blocks.push(section(USER_MESSAGES.UNEXPECTED_FORMAT));
    return blocks;
  }

  const tableText = layoutTable(table.columns.map(col => col.name), rows);
  blocks.push(section("```" + truncateTable(tableText) + "```"));
  return blocks;
}

export function renderBlocks(payload: AnswerPayload): Block[] {
  switch (payload.kind) {
    case "tabular":
      return renderTableBlocks(payload);
    case "message":
      return [section(payload.text)];
    case "error":
    default:
      return [section(USER_MESSAGES.NO_DATA)];
  }
}
