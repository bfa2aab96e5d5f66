import type { AnswerPayload, TabularAnswer } from "@shared/schema";
import { USER_MESSAGES } from "../config/constants";
import { formatTableRows } from "./valueFormatter";

function renderTable(table: TabularAnswer): string {
  let response = "";
  if (table.description) {
    response += `## Query Description\n\n${table.description}\n\n`;
  }
  response += "## Query Results\n\n";

  const rows = formatTableRows(table);
  if (rows === null) {
    return response + `${USER_MESSAGES.UNEXPECTED_FORMAT}\n\n`;
  }

  const header = "| " + table.columns.map(col => col.name).join(" | ") + " |";
  const separator = "|" + table.columns.map(() => "---").join("|") + "|";
  response += header + "\n" + separator + "\n";
  for (const row of rows) {
    response += "| " + row.join(" | ") + " |\n";
  }
  return response;
}

/**
 * Render an answer as markdown-style text for channels without rich layout.
 * Tables are emitted in full.
 */
export function renderPlain(payload: AnswerPayload): string {
  switch (payload.kind) {
    case "tabular":
      return renderTable(payload);
    case "message":
      return `${payload.text}\n\n`;
    case "error":
    default:
      return `${USER_MESSAGES.NO_DATA}\n\n`;
  }
}
