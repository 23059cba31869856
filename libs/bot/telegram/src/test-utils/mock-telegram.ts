/**
 * Mock utilities for testing Telegram bot
 */

import { Context } from 'telegraf';

export interface MockTelegramContext {
  chat?: { id: number; type: 'private' };
  message?: { message_id: number; date: number; text: string };
  reply: jest.Mock;
  sendChatAction: jest.Mock;
}

/**
 * Create mock context for text message
 */
export function createMockContext(
  text: string,
  chatId: number | null = 123
): MockTelegramContext {
  return {
    chat: chatId === null ? undefined : { id: chatId, type: 'private' },
    message: { message_id: 1, date: 1735689600, text },
    reply: jest.fn().mockResolvedValue(undefined),
    sendChatAction: jest.fn().mockResolvedValue(undefined),
  };
}

/**
 * Hand the mock to code that expects a Telegraf context
 */
export function asContext(mock: MockTelegramContext): Context {
  return mock as unknown as Context;
}

/**
 * Find the handler the service registered on a mocked bot method
 */
export function registeredHandler(
  registrar: jest.Mock,
  name: string
): (ctx: Context) => Promise<void> {
  const call = registrar.mock.calls.find((args: unknown[]) => args[0] === name);
  if (!call) {
    throw new Error(`No handler registered for ${name}`);
  }
  return call[1];
}

/**
 * Every text passed to ctx.reply, in order
 */
export function repliesOf(mock: MockTelegramContext): string[] {
  return mock.reply.mock.calls.map((args: unknown[]) => String(args[0]));
}
