/**
 * @tandem/core
 *
 * Errors, descriptor access, tool table schemas and lifecycle events
 * shared by every tandem package.
 */

export * from './errors.js'
export * from './types.js'

export { validateTandemTable, validateTypeoTable } from './schemas/index.js'
export type { ValidationError, ValidationResult } from './schemas/index.js'

export { ProjectConfig, isTomlTable } from './config/descriptor.js'

export {
  EVENT_LEVELS,
  JsonlEventSink,
  MemoryEventSink,
  fanOut,
  formatEvent,
  nullEventSink,
  stampEvent,
} from './events/index.js'
export type {
  BaseEvent,
  CommandCompletedEvent,
  CommandStartedEvent,
  EnvironmentCreatedEvent,
  EventLevel,
  EventSink,
  InstallSkippedEvent,
  InstallStartedEvent,
  InstallUpdatingEvent,
  JsonlEventSinkOptions,
  PipelineCompletedEvent,
  PipelineStartedEvent,
  StepCompletedEvent,
  StepFailedEvent,
  StepStartedEvent,
  TandemEvent,
  TandemEventInput,
  TandemEventName,
} from './events/index.js'
