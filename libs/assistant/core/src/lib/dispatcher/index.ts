export * from './response-dispatcher.service';
