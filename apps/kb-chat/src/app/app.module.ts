import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { assistantConfig } from '@kb-chat/assistant/config';
import { TelegramBotModule } from '@kb-chat/bot/telegram';
import telegramConfig from '../environment';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [telegramConfig, assistantConfig],
      envFilePath: ['.env.local', '.env'],
    }),
    TelegramBotModule,
  ],
})
export class AppModule {}
