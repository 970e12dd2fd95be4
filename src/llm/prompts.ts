/**
 * Prompt templates for rewording and QA-pair extraction.
 */

/**
 * Prompt asking for `count` rephrasings of a question, one per line.
 */
export function buildRewordingPrompt(question: string, count: number): string {
  return `Rephrase the [ORIGINAL QUESTION] in ${count} distinct ways.
Keep the meaning and context intact. Avoid near-duplicates and simple synonym swaps.
Return only the reworded questions, one per line, without numbers or bullets.

## Example:
[ORIGINAL QUESTION]: How long does it take to boil an egg?
[REWRITTEN QUESTIONS]:
What is the cooking time for a boiled egg?
For how many minutes should an egg be boiled?
How much time does an egg need in boiling water?

## Input:
[ORIGINAL QUESTION]: ${question}
[REWRITTEN QUESTIONS]:`;
}

export const QA_PAIRS_SYSTEM_PROMPT = `Generate a balanced set (2 or more) of questions, with their answers, from the given text.
Mix factual, analytical, cause-and-effect, comparison and scenario-based questions.
Only ask questions whose answers are present in the text. Do not speculate.
Format the result as JSON: an array of objects, each with a "q" key for the question
and an "a" key for the answer. When a top-level object is required, use {"pairs": [...]}.

## Example:
[INPUT TEXT]
A lighthouse marks dangerous coastlines and guides ships into harbour. Its lamp
rotates so that each lighthouse flashes in a distinct pattern, which lets sailors
identify it at night.

[OUTPUT JSON]
{"pairs": [
  {"q": "What is the purpose of a lighthouse?", "a": "It marks dangerous coastlines and guides ships into harbour."},
  {"q": "Why does a lighthouse lamp rotate?", "a": "Rotation gives each lighthouse a distinct flash pattern so sailors can identify it at night."}
]}`;

/**
 * User message carrying the prose to extract pairs from.
 */
export function buildQaPairsUserPrompt(text: string): string {
  return `[INPUT TEXT]\n${text}\n\n[OUTPUT JSON]\n`;
}

/**
 * Follow-up message after a response that could not be used.
 */
export function buildQaPairsRetryPrompt(error: string): string {
  return `The previous response could not be used: ${error}
Respond again with only valid JSON: an array of {"q": ..., "a": ...} objects (or {"pairs": [...]}).`;
}
