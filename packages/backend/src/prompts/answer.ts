export function buildAnswerPrompt(context: string, question: string): string {
  return `Use the following context to answer the question.

Context: ${context}
Question: ${question}
Answer:`;
}
