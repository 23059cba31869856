import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf, Context } from 'telegraf';
import {
  assistantConfig,
  AssistantConfig,
  ConfigurationError,
} from '@kb-chat/assistant/config';
import { SessionOrchestrator } from '@kb-chat/bot/sessions';
import { BotMessages } from '@kb-chat/bot/common';
import { ConversationManagerService } from './conversation-manager.service';
import { TelegramFormatterService } from './formatters/telegram-formatter.service';

export type TelegramUpdate = Parameters<Telegraf['handleUpdate']>[0];

@Injectable()
export class TelegramBotService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private bot: Telegraf;
  private readonly logger = new Logger(TelegramBotService.name);
  private readonly webhookEnabled: boolean;
  private polling = false;

  constructor(
    private configService: ConfigService,
    private conversationManager: ConversationManagerService,
    private sessionOrchestrator: SessionOrchestrator,
    private telegramFormatter: TelegramFormatterService,
    @Inject(assistantConfig.KEY) private readonly config: AssistantConfig
  ) {
    const token = this.configService.get<string>('telegram.botToken');
    if (!token) {
      throw new ConfigurationError('TELEGRAM_BOT_TOKEN is not configured', [
        'TELEGRAM_BOT_TOKEN',
      ]);
    }

    this.bot = new Telegraf(token);
    this.webhookEnabled =
      this.configService.get<boolean>('telegram.webhookEnabled') || false;
  }

  async onApplicationBootstrap() {
    this.setupBot();

    if (!this.webhookEnabled) {
      this.logger.log('Starting bot in polling mode...');
      this.polling = true;
      this.bot.launch().catch((error: unknown) => {
        this.polling = false;
        this.logger.error('❌ Failed to start bot:', error);
      });
      this.logger.log('✅ Bot launched in polling mode');
    } else {
      await this.setupWebhook();
    }
  }

  onApplicationShutdown(signal?: string) {
    if (!this.polling) {
      return;
    }
    this.polling = false;
    this.logger.log(`Stopping bot${signal ? ` (${signal})` : ''}`);
    this.bot.stop(signal);
  }

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    await this.bot.handleUpdate(update);
  }

  private setupBot() {
    // Command handlers
    this.bot.command('start', this.handleStartCommand.bind(this));
    this.bot.command('help', this.handleHelpCommand.bind(this));
    this.bot.command('new', this.handleNewCommand.bind(this));
    this.bot.command('clear', this.handleNewCommand.bind(this)); // alias
    this.bot.command('status', this.handleStatusCommand.bind(this));
    this.bot.command('config', this.handleConfigCommand.bind(this));
    this.bot.command('sources', this.handleSourcesCommand.bind(this));

    // Everything else is a question for the assistant
    this.bot.on('text', this.handleTextMessage.bind(this));

    // Error handling
    this.bot.catch((err: unknown, ctx) => {
      const errorMessage = err instanceof Error ? err.message : 'Unknown error';
      this.logger.error(`Bot error: ${errorMessage}`);
      ctx.reply(BotMessages.GENERIC_ERROR).catch((replyError: unknown) => {
        this.logger.warn(`Failed to report bot error: ${String(replyError)}`);
      });
    });
  }

  /**
   * /start - Welcome message
   */
  private async handleStartCommand(ctx: Context) {
    await ctx.reply(
      BotMessages.WELCOME(this.config.appTitle, this.config.productName)
    );
  }

  /**
   * /help - Help message
   */
  private async handleHelpCommand(ctx: Context) {
    await ctx.reply(BotMessages.HELP_TEXT);
  }

  /**
   * /new, /clear - Discard the transcript and start fresh
   */
  private async handleNewCommand(ctx: Context) {
    const chatId = ctx.chat?.id.toString();
    if (!chatId) {
      await ctx.reply(BotMessages.UNABLE_TO_IDENTIFY_CHAT);
      return;
    }

    try {
      const currentSession = this.sessionOrchestrator.getSession(chatId);
      if (currentSession) {
        this.sessionOrchestrator.stopSession(chatId, 'User cleared the chat');
        this.logger.log(`[${chatId}] Stopped session: ${currentSession.sessionId}`);
      }

      const newSession = this.sessionOrchestrator.getOrCreateSession(chatId);
      this.logger.log(`[${chatId}] Created new session: ${newSession.sessionId}`);

      await ctx.reply(BotMessages.NEW_SESSION);
    } catch (error) {
      this.logger.error(`[${chatId}] Error starting new session:`, error);
      await ctx.reply(BotMessages.NEW_SESSION_FAILED);
    }
  }

  /**
   * /status - Show session info
   */
  private async handleStatusCommand(ctx: Context) {
    const chatId = ctx.chat?.id.toString();
    if (!chatId) {
      await ctx.reply(BotMessages.UNABLE_TO_IDENTIFY_CHAT);
      return;
    }

    try {
      const session = this.sessionOrchestrator.getSession(chatId);
      if (!session) {
        await ctx.reply(BotMessages.NO_ACTIVE_SESSION);
        return;
      }

      await ctx.reply(
        BotMessages.SESSION_STATUS({
          sessionId: session.sessionId,
          state: session.status,
          duration: this.formatDuration(Date.now() - session.createdAt.getTime()),
          turns: session.conversationHistory.length,
        })
      );
    } catch (error) {
      this.logger.error(`[${chatId}] Error getting status:`, error);
      await ctx.reply(BotMessages.SESSION_STATUS_FAILED);
    }
  }

  /**
   * /config - Region, model and product in use
   */
  private async handleConfigCommand(ctx: Context) {
    await ctx.reply(
      BotMessages.CONFIG_SUMMARY(
        this.config.region,
        this.config.modelId,
        this.config.productName
      )
    );
  }

  /**
   * /sources - Excerpts and locations behind the last answer
   */
  private async handleSourcesCommand(ctx: Context) {
    const chatId = ctx.chat?.id.toString();
    if (!chatId) {
      await ctx.reply(BotMessages.UNABLE_TO_IDENTIFY_CHAT);
      return;
    }

    const citations = this.sessionOrchestrator.getLastCitations(chatId);
    await this.telegramFormatter.sendLongMessage(
      ctx,
      this.telegramFormatter.formatCitations(citations)
    );
  }

  /**
   * Handle text messages - route to the assistant
   */
  private async handleTextMessage(ctx: Context) {
    const text = ctx.message && 'text' in ctx.message ? ctx.message.text : '';
    const chatId = ctx.chat?.id.toString();

    if (!chatId) return;

    try {
      const started = await this.conversationManager.executeConversation(
        chatId,
        text,
        ctx
      );
      if (!started) {
        await ctx.reply(BotMessages.WAIT_FOR_RESPONSE);
      }
    } catch (error) {
      this.logger.error(`[${chatId}] Error executing conversation:`, error);
      await ctx.reply(BotMessages.CONVERSATION_FAILED);
    }
  }

  /**
   * Format duration to human-readable string
   */
  private formatDuration(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);

    if (hours > 0) {
      return `${hours}h ${minutes % 60}m`;
    } else if (minutes > 0) {
      return `${minutes}m ${seconds % 60}s`;
    } else {
      return `${seconds}s`;
    }
  }

  /**
   * Setup webhook for production
   */
  private async setupWebhook() {
    const domain = this.configService.get<string>('telegram.webhookDomain');
    const path = this.configService.get<string>('telegram.webhookPath');

    if (domain) {
      const webhookUrl = `${domain}${path}`;
      await this.bot.telegram.setWebhook(webhookUrl);
      this.logger.log(`Webhook set: ${webhookUrl}`);
    } else {
      this.logger.warn('Webhook mode enabled but WEBHOOK_DOMAIN is not set');
    }
  }
}
