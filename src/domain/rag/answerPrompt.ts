/**
 * Prompt construction for grounded answers.
 *
 * The model only ever sees documents the caller was authorized to retrieve,
 * so an empty or unhelpful context is presented as a likely permission gap
 * rather than missing knowledge.
 */
import type { DocumentRecord } from "@domain/documents/document";

export const ANSWER_INSTRUCTIONS = [
  "You are a helpful assistant that answers questions based on the provided documents.",
  "If the answer can not be found in the documents, assume the user is not authorized to view them.",
].join(" ");

function formatMetadata(metadata: Record<string, unknown>): string | null {
  const entries = Object.entries(metadata);
  if (entries.length === 0) {
    return null;
  }

  return entries
    .map(([key, value]) =>
      `${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`
    )
    .join(", ");
}

export function buildAnswerPrompt(
  question: string,
  documents: readonly DocumentRecord[]
): string {
  const lines: string[] = [ANSWER_INSTRUCTIONS, "", "Context Documents:"];

  if (documents.length === 0) {
    lines.push("(none)");
  }

  documents.forEach((doc, i) => {
    lines.push("", `Document ${i + 1}: ${doc.title}`);
    lines.push(`Content: ${doc.content}`);
    lines.push(`ID: ${doc.id}`);

    const metadata = formatMetadata(doc.metadata);
    if (metadata) {
      lines.push(`Metadata: ${metadata}`);
    }
    lines.push("---");
  });

  lines.push("", `Question: ${question}`, "");
  lines.push(
    "Please answer the question based ONLY on the information provided in the context documents above. " +
      "If you can not answer based on the information the user is likely unauthorized to review the documents."
  );
  lines.push("", "Answer:");

  return lines.join("\n");
}
