export * from './telegram-formatter.service';
