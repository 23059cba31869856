/**
 * User-facing replies produced by the assistant itself (not by Bedrock)
 */
export interface AssistantMessagesType {
  FALLBACK: (productName: string) => string;
  SERVICE_UNAVAILABLE: (productName: string) => string;
}

export const AssistantMessages: AssistantMessagesType = {
  FALLBACK: (productName: string) =>
    `I can only help with questions about ${productName}. ` +
    `Try asking about its features, pricing, orders or support.`,

  SERVICE_UNAVAILABLE: (productName: string) =>
    `⚠️ Sorry, I couldn't reach the ${productName} knowledge base right now. ` +
    `Please try again in a moment.`,
};
