// lib/rag/prompt.ts

export function buildAnswerPrompt(question: string, context: string[]): string {
  const ctx = context.join("\n\n");
  return `Based on the following context, answer the question. If the context doesn't contain enough information to answer the question, say so.

Context:
${ctx}

Question: ${question}

Answer:`;
}
