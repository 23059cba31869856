/**
 * Type definition for bot messages
 * Supports both static strings and parameterized message functions
 */
export interface BotMessagesType {
  // Greeting
  WELCOME: (appTitle: string, productName: string) => string;
  HELP_TEXT: string;

  // Session management
  NEW_SESSION: string;
  NEW_SESSION_FAILED: string;
  NO_ACTIVE_SESSION: string;
  SESSION_STATUS: (status: {
    sessionId: string;
    state: string;
    duration: string;
    turns: number;
  }) => string;

  // Errors
  GENERIC_ERROR: string;
  UNABLE_TO_IDENTIFY_CHAT: string;
  SESSION_STATUS_FAILED: string;
  WAIT_FOR_RESPONSE: string;
  CONVERSATION_FAILED: string;

  // Answer details
  NO_SOURCES: string;
  SOURCES_HEADER: string;
  CONFIG_SUMMARY: (region: string, modelId: string, productName: string) => string;
}

/**
 * Centralized bot messages for consistent user communication
 * All user-facing messages should be defined here
 */
export const BotMessages: BotMessagesType = {
  WELCOME: (appTitle: string, productName: string) => `👋 Welcome to ${appTitle}!

💬 Ask me anything about ${productName}...

📋 Commands:
/new or /clear - Clear the chat
/sources - Show where the last answer came from
/status - Check session status
/config - Show the assistant configuration
/help - Show this help`,

  HELP_TEXT: `📖 Help

Just type your question and I'll look it up in the product knowledge base.

📋 Commands:
/start - Show the welcome message
/new or /clear - Clear the chat and start over
/sources - Show the sources behind the last answer
/status - View session info
/config - Show region, model and product
/help - Show this help`,

  NEW_SESSION: `🔄 Chat cleared. Let's start fresh!`,

  NEW_SESSION_FAILED: '❌ Failed to clear the chat. Please try again.',

  NO_ACTIVE_SESSION: `📭 No active session.

Send a question to start chatting.`,

  SESSION_STATUS: ({ sessionId, state, duration, turns }) => `📊 Session Status

Session ID: ${sessionId}
Status: ${state}
Duration: ${duration}
Messages: ${turns}

Use /new to start fresh or continue chatting!`,

  GENERIC_ERROR: '❌ An error occurred. Please try again.',

  UNABLE_TO_IDENTIFY_CHAT: '❌ Unable to identify chat',

  SESSION_STATUS_FAILED: '❌ Failed to get session status.',

  WAIT_FOR_RESPONSE: '⏳ Please wait for the current response to complete.',

  CONVERSATION_FAILED: '❌ Failed to process your question. Please try again.',

  NO_SOURCES: '📭 The last answer has no sources to show.',

  SOURCES_HEADER: '📚 Sources for the last answer:',

  CONFIG_SUMMARY: (region: string, modelId: string, productName: string) => `⚙️ Configuration

AWS Region: ${region}
Model: ${modelId}
Product: ${productName}`,
};
