import { Injectable, Logger } from '@nestjs/common';
import { Context } from 'telegraf';
import { AssistantService, advanceTranscript } from '@kb-chat/assistant/core';
import { SessionOrchestrator } from '@kb-chat/bot/sessions';
import { TelegramFormatterService } from './formatters/telegram-formatter.service';

/**
 * ConversationManagerService - Runs one question/answer turn per chat
 *
 * - Provides a single high-level method for the bot: executeConversation()
 * - Keeps at most one turn in flight per chat
 * - Stores the advanced transcript on the session, then renders the reply
 */
@Injectable()
export class ConversationManagerService {
  private readonly logger = new Logger(ConversationManagerService.name);
  private readonly activeResponses = new Set<string>();

  constructor(
    private readonly sessionOrchestrator: SessionOrchestrator,
    private readonly assistant: AssistantService,
    private readonly telegramFormatter: TelegramFormatterService
  ) {}

  /**
   * Run one turn for the chat.
   *
   * Resolves false without doing anything when a turn is already in flight
   * for the chat. The claim is taken before the first await, so two updates
   * handled concurrently can never both start.
   */
  async executeConversation(
    chatId: string,
    userMessage: string,
    ctx: Context
  ): Promise<boolean> {
    // 1. Claim the chat
    if (!this.tryStartResponding(chatId)) {
      return false;
    }

    try {
      // 2. Get or create session
      const session = this.sessionOrchestrator.getOrCreateSession(chatId);
      const sessionId = session.sessionId;
      const history = session.conversationHistory;

      this.logger.log(
        `[${chatId}] Executing conversation (session: ${sessionId}, history: ${history.length} turns)`
      );

      await ctx.sendChatAction('typing');

      // 3. Ask the assistant and extend the transcript
      const { transcript, response } = await advanceTranscript(
        history,
        userMessage,
        (query) => this.assistant.answer(query)
      );

      // 4. Store it unless the chat was cleared meanwhile
      const committed = this.sessionOrchestrator.commitTurn(
        chatId,
        sessionId,
        history.length,
        transcript,
        response.citations
      );
      if (!committed) {
        return true;
      }

      // 5. Render
      this.logger.debug(
        `[${chatId}] Sending ${response.origin} answer (${response.text.length} chars, ${response.citations.length} citations)`
      );
      await this.telegramFormatter.sendLongMessage(ctx, response.text);
      return true;
    } finally {
      this.stopResponding(chatId);
    }
  }

  private tryStartResponding(chatId: string): boolean {
    if (this.activeResponses.has(chatId)) {
      this.logger.debug(`[${chatId}] Already responding`);
      return false;
    }
    this.activeResponses.add(chatId);
    this.logger.log(`[${chatId}] Started responding`);
    return true;
  }

  private stopResponding(chatId: string): void {
    this.activeResponses.delete(chatId);
    this.logger.log(`[${chatId}] Stopped responding`);
  }
}
