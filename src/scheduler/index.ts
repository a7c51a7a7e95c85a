export {
  SchedulingCoordinator,
  createCoordinator,
  createLoggingRunner,
  type CoordinatorDependencies,
  type CreateCoordinatorOptions,
} from './coordinator.js';
export {
  NodeCronEngine,
  isValidExpression,
  resolveTimezone,
  type TriggerEngine,
  type TriggerHandle,
  type TriggerCallback,
  type NodeCronEngineOptions,
} from './trigger-engine.js';
export { TriggerTable, Mutex } from './trigger-table.js';
export type {
  TaskRunner,
  ClockConfig,
  RegistrationFailure,
  StartAllReport,
  CoordinatorEvents,
} from './types.js';
