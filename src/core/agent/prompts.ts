/**
 * Prompt text for both agents.
 */

export function promptTokenEstimate(str: string): number {
  return Math.ceil(str.length / 4);
}

/**
 * Keep the most recent lines that fit in `maxTokens`.
 */
export function ensurePromptLimit(prompt: string, maxTokens = 4000): string {
  if (promptTokenEstimate(prompt) <= maxTokens) return prompt;
  const parts = prompt.split("\n");
  let acc = "";
  for (let i = parts.length - 1; i >= 0; i--) {
    const next = acc === "" ? parts[i] : `${parts[i]}\n${acc}`;
    if (promptTokenEstimate(next) > maxTokens) break;
    acc = next;
  }
  return acc;
}

const DOMAIN =
  "You answer questions about average household spending in Norway. " +
  "Figures come from Statistics Norway (SSB) through the tools below; do not make numbers up.";

export function reactSystemPrompt(toolDescriptions: string): string {
  return [
    DOMAIN,
    "",
    "Tools:",
    toolDescriptions,
    "",
    "Reply in exactly this format:",
    "Thought: what you need to find out next",
    'Action: tool_name("argument", ...)',
    "",
    "You will then be given:",
    "Observation: the tool result",
    "",
    "Repeat Thought and Action as often as needed, one Action per reply.",
    "When you have the figures, reply with:",
    "Thought: I can answer now",
    "Final Answer: the answer, with the figures and their source",
    "",
    "Never write an Observation yourself.",
  ].join("\n");
}

export function baselineSystemPrompt(toolDescriptions: string): string {
  return [
    DOMAIN,
    "",
    "Tools:",
    toolDescriptions,
    "",
    "You may call at most one tool. To call it, reply with:",
    'Action: tool_name("argument", ...)',
    "Otherwise reply with:",
    "Final Answer: your answer",
  ].join("\n");
}

export function reactPrompt(question: string, renderedTrace: string, correction?: string, maxTokens?: number): string {
  const parts = [`Question: ${question}`];
  if (renderedTrace !== "") parts.push(ensurePromptLimit(renderedTrace, maxTokens));
  if (correction) parts.push(correction);
  return parts.join("\n");
}

export function baselinePrompt(question: string): string {
  return `Question: ${question}`;
}

export function baselineFollowUpPrompt(question: string, renderedTrace: string): string {
  return [`Question: ${question}`, renderedTrace, "Answer the question using the observation. Reply with:", "Final Answer: your answer"].join(
    "\n"
  );
}

export function parseCorrection(reason: string): string {
  return (
    `Your previous reply could not be used (${reason}). ` +
    'Reply with "Thought:" followed by either one "Action:" line or a "Final Answer:" line.'
  );
}

export const TIMEOUT_CORRECTION = "Your previous reply took too long. Reply briefly with one Action or a Final Answer.";
