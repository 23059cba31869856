export * from './session.interface';
export * from './session-repository.interface';
