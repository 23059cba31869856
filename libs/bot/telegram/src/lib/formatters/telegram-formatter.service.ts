import { Injectable, Logger } from '@nestjs/common';
import { Context } from 'telegraf';
import { SourceCitation } from '@kb-chat/shared/types';
import { BotMessages } from '@kb-chat/bot/common';

/**
 * TelegramFormatterService - Telegram-Specific Message Formatting
 *
 * Answers are sent as plain text, exactly as the knowledge base returned
 * them. Anything over the message limit is split at newline boundaries.
 */
@Injectable()
export class TelegramFormatterService {
  private readonly logger = new Logger(TelegramFormatterService.name);
  static readonly MAX_LENGTH = 4000;
  private static readonly EXCERPT_LENGTH = 300;

  async sendLongMessage(ctx: Context, content: string): Promise<void> {
    this.logger.debug(`sendLongMessage called - content length: ${content.length}`);

    for (const chunk of this.splitIntoChunks(content, TelegramFormatterService.MAX_LENGTH)) {
      await ctx.reply(chunk);
    }
  }

  /**
   * Render the citations of the last answer for /sources
   */
  formatCitations(citations: SourceCitation[]): string {
    if (citations.length === 0) {
      return BotMessages.NO_SOURCES;
    }

    const entries = citations.map((citation, index) => {
      const lines = [`${index + 1}. ${citation.uri ?? 'Unknown source'}`];
      if (citation.excerpt) {
        lines.push(`   "${this.truncate(citation.excerpt.trim())}"`);
      }
      return lines.join('\n');
    });

    return [BotMessages.SOURCES_HEADER, '', ...entries].join('\n');
  }

  /**
   * Split text into chunks at newline boundaries.
   * The newline between two chunks opens the second one, so the chunks
   * concatenate back to the original text.
   */
  splitIntoChunks(text: string, maxLength: number): string[] {
    const chunks: string[] = [];
    let currentChunk: string | null = null;

    for (const line of text.split('\n')) {
      const piece: string = currentChunk === null ? line : `\n${line}`;

      if (currentChunk !== null && currentChunk.length + piece.length <= maxLength) {
        currentChunk += piece;
        continue;
      }

      if (currentChunk) {
        chunks.push(currentChunk);
      }

      // If single line is too long, split it forcefully
      let remaining = piece;
      while (remaining.length > maxLength) {
        chunks.push(remaining.substring(0, maxLength));
        remaining = remaining.substring(maxLength);
      }
      currentChunk = remaining;
    }

    if (currentChunk) {
      chunks.push(currentChunk);
    }

    return chunks;
  }

  private truncate(text: string): string {
    const limit = TelegramFormatterService.EXCERPT_LENGTH;
    return text.length > limit ? `${text.substring(0, limit)}…` : text;
  }
}
