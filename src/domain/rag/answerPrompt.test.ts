import { describe, expect, it } from "vitest";

import { ANSWER_INSTRUCTIONS, buildAnswerPrompt } from "@domain/rag/answerPrompt";

const CLOSING =
  "Please answer the question based ONLY on the information provided in the context documents above. " +
  "If you can not answer based on the information the user is likely unauthorized to review the documents.";

describe("buildAnswerPrompt", () => {
  it("lists every document with its metadata", () => {
    const prompt = buildAnswerPrompt("What is the refund?", [
      {
        id: "a",
        title: "Acme refund",
        content: "Refund of 120",
        metadata: { taxpayer: "Acme Corp", year: 2023 },
      },
      { id: "b", title: "Notes", content: "None", metadata: {} },
    ]);

    expect(prompt.split("\n")).toEqual([
      ANSWER_INSTRUCTIONS,
      "",
      "Context Documents:",
      "",
      "Document 1: Acme refund",
      "Content: Refund of 120",
      "ID: a",
      "Metadata: taxpayer: Acme Corp, year: 2023",
      "---",
      "",
      "Document 2: Notes",
      "Content: None",
      "ID: b",
      "---",
      "",
      "Question: What is the refund?",
      "",
      CLOSING,
      "",
      "Answer:",
    ]);
  });

  it("marks an empty context", () => {
    const lines = buildAnswerPrompt("Anything?", []).split("\n");

    expect(lines.slice(0, 4)).toEqual([
      ANSWER_INSTRUCTIONS,
      "",
      "Context Documents:",
      "(none)",
    ]);
    expect(lines).toContain("Question: Anything?");
  });
});
