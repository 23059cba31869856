import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SessionStoreModule } from '@kb-chat/bot/sessions';
import { AssistantModule } from '@kb-chat/assistant/core';
import { TelegramBotService } from './telegram-bot.service';
import { TelegramBotController } from './telegram-bot.controller';
import { ConversationManagerService } from './conversation-manager.service';
import { TelegramFormatterService } from './formatters';

@Module({
  imports: [ConfigModule, SessionStoreModule, AssistantModule],
  controllers: [TelegramBotController],
  providers: [
    TelegramBotService,
    ConversationManagerService,
    TelegramFormatterService,
  ],
  exports: [TelegramBotService],
})
export class TelegramBotModule {}
