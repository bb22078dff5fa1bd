/**
 * Error recovery
 */

export { RecoveryController } from './RecoveryController.js';
export type { RecoveryControllerOptions } from './RecoveryController.js';
export { recoveryFor, unhandledRecovery } from './RecoveryPolicy.js';
export type { RecoveryAction, RecoveryStrategy, RecoveryStrategyFor } from './RecoveryPolicy.js';
