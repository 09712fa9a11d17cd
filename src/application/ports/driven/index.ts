/**
 * Exportações centralizadas dos ports driven (integrações externas)
 */
export type { Logger, LogContext } from './logger-port.js';
export type { UserRepository, Clock } from './user-repository.port.js';
