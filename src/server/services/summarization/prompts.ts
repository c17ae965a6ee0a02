export const MAP_SYSTEM_PROMPT = `You are a document summarizer. Summarize the following section of a document.
Focus on key points, main ideas, and important details.
Keep the summary concise but informative.`;

export const REDUCE_SYSTEM_PROMPT = `You are a document summarizer. You are given summaries of different sections from a single document.
Combine these into one coherent, well-structured summary.
Use markdown formatting for better readability.
Highlight the most important points and maintain logical flow.`;

// Placed between summaries when a batch is combined
export const SUMMARY_SEPARATOR = '\n\n---\n\n';

export function buildMapPrompt(chunk: string): string {
  return `Summarize this section:\n\n${chunk}`;
}

export function buildCombinePrompt(summaries: readonly string[]): string {
  return `Combine these section summaries into a final summary:\n\n${summaries.join(SUMMARY_SEPARATOR)}`;
}
