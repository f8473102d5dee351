/**
 * Prompt templates for question answering over indexed regulations
 */

export interface AnswerContext {
  index: number;
  content: string;
  filename: string;
  articleTitle?: string;
  subTheme?: string;
}

export interface ChatTurn {
  question: string;
  answer: string;
}

export const ASSISTANT_SYSTEM_PROMPT = `You are a regulatory analyst answering questions about financial-sector regulations. Answer based ONLY on the provided context articles.

Rules:
1. Only use information from the provided articles
2. Cite your sources using [N] notation where N is the context number
3. If the information is not in the articles, say "I cannot find this information in the provided documents."
4. Quote article numbers when they matter for the answer
5. At the end, list all citation numbers you used in a "Citations:" section`;

export const OCR_PROMPT =
  'Convert this regulation page to Markdown. Keep every line of the text in reading order, including chapter and article headings on their own lines. Output only the markdown content without any preamble.';

export const NO_ANSWER_RESPONSE =
  'I cannot find this information in the provided documents. Try rephrasing the question or ingesting the relevant regulation first.';

export const REPHRASE_SYSTEM_PROMPT = `Given a short history of questions and answers and the latest user question, rewrite the latest question as a standalone question that can be understood without the history.
Do not answer the question. Do not ask for clarification. Return only the rewritten question, or the question unchanged if it already stands on its own.`;

export function formatContexts(contexts: AnswerContext[]): string {
  return contexts
    .map((ctx) => {
      const location = [ctx.filename, ctx.articleTitle, ctx.subTheme].filter(Boolean).join(', ');
      return `[${ctx.index}] (${location}):\n${ctx.content}`;
    })
    .join('\n\n---\n\n');
}

export function generateUserPrompt(query: string, contextText: string): string {
  return `Context Articles:
${contextText}

---

Question: ${query}

Answer the question based only on the context above, citing sources with [N] notation.`;
}

export function generateRephrasePrompt(query: string, history: ChatTurn[]): string {
  const transcript = history
    .map((turn) => `User: ${turn.question}\nAssistant: ${turn.answer}`)
    .join('\n\n');

  return `History:
${transcript}

Latest question: ${query}`;
}
