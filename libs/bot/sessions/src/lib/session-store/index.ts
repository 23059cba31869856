// Interfaces
export * from './interfaces';

// Repositories
export * from './repositories/in-memory-session.repository';

// Services
export * from './session-orchestrator.service';

// Module
export * from './session-store.module';
