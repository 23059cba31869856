import { Controller, Post, Body, Get, HttpCode } from '@nestjs/common';
import { TelegramBotService, TelegramUpdate } from './telegram-bot.service';

@Controller('telegram')
export class TelegramBotController {
  constructor(private readonly botService: TelegramBotService) {}

  @Post('webhook')
  @HttpCode(200)
  async handleWebhook(@Body() update: TelegramUpdate) {
    await this.botService.handleUpdate(update);
    return { ok: true };
  }

  @Get('health')
  health() {
    return {
      status: 'healthy',
      service: 'kb-chat',
      timestamp: new Date().toISOString(),
    };
  }
}
