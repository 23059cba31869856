export * from './lib/telegram-bot.module';
export * from './lib/telegram-bot.service';
export * from './lib/telegram-bot.controller';
export * from './lib/conversation-manager.service';
export * from './lib/formatters';
