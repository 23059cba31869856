/**
 * System prompts sent to the foundation model
 */

export const classifierSystemPrompt = (productName: string): string =>
  `Decide which category the user's message belongs to:
"Product" - the message is about ${productName}
"Generic" - anything else.
Reply with the category name only: Product or Generic.`;

export const GENERIC_ASSISTANT_SYSTEM_PROMPT =
  'You are a helpful assistant. Answer clearly and professionally.';

export const CLASSIFIER_MAX_TOKENS = 10;
export const GENERIC_MAX_TOKENS = 500;
