export * from './lib/messages';
