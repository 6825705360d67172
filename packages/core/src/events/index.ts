/**
 * Structured lifecycle events (JSONL format)
 *
 * Every component receives an EventSink instead of writing to a global
 * logger. The CLI fans events out to the console reporter and, with
 * --log-file, to a JSONL file.
 */

import { type WriteStream, createWriteStream } from 'node:fs'
import { mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'

// ============================================================================
// Event Types
// ============================================================================

export type EventLevel = 'debug' | 'info' | 'error'

/** Base event fields included in all events */
export interface BaseEvent {
  /** Event type identifier */
  event: string
  /** ISO 8601 timestamp */
  timestamp: string
  level: EventLevel
}

interface ProjectEventFields {
  /** Project name */
  project: string
  /** Project root */
  path: string
  /** Environment name */
  environment: string
}

/** Emitted after a new environment has been provisioned */
export interface EnvironmentCreatedEvent extends BaseEvent, ProjectEventFields {
  event: 'environment_created'
}

/** Emitted before a project is installed into its environment */
export interface InstallStartedEvent extends BaseEvent, ProjectEventFields {
  event: 'install_started'
}

/** Emitted before an already-installed project is re-synced */
export interface InstallUpdatingEvent extends BaseEvent, ProjectEventFields {
  event: 'install_updating'
  /** Which environment capability performs the re-sync */
  strategy: 'reinstall' | 'update'
}

/** Emitted when install finds nothing to do */
export interface InstallSkippedEvent extends BaseEvent, ProjectEventFields {
  event: 'install_skipped'
}

/** Emitted before a command runs inside an environment */
export interface CommandStartedEvent extends BaseEvent, ProjectEventFields {
  event: 'command_started'
  argv: string[]
}

/** Emitted after a command inside an environment exits zero */
export interface CommandCompletedEvent extends BaseEvent, ProjectEventFields {
  event: 'command_completed'
  argv: string[]
  durationMs: number
}

/** Emitted when a pipeline run begins */
export interface PipelineStartedEvent extends BaseEvent {
  event: 'pipeline_started'
  pipeline: string
  steps: string[]
}

/** Emitted before a step is resolved */
export interface StepStartedEvent extends BaseEvent {
  event: 'step_started'
  pipeline: string
  step: string
  /** Zero-based position in the pipeline */
  index: number
  total: number
}

/** Emitted with the captured stdout of a finished step */
export interface StepCompletedEvent extends BaseEvent {
  event: 'step_completed'
  pipeline: string
  step: string
  index: number
  stdout: string
  durationMs: number
}

/** Emitted when a step fails; the pipeline stops after it */
export interface StepFailedEvent extends BaseEvent {
  event: 'step_failed'
  pipeline: string
  step: string
  index: number
  error: string
}

/** Emitted after every step has succeeded */
export interface PipelineCompletedEvent extends BaseEvent {
  event: 'pipeline_completed'
  pipeline: string
  steps: number
  totalDurationMs: number
}

/** Union of all event types */
export type TandemEvent =
  | EnvironmentCreatedEvent
  | InstallStartedEvent
  | InstallUpdatingEvent
  | InstallSkippedEvent
  | CommandStartedEvent
  | CommandCompletedEvent
  | PipelineStartedEvent
  | StepStartedEvent
  | StepCompletedEvent
  | StepFailedEvent
  | PipelineCompletedEvent

export type TandemEventName = TandemEvent['event']

/** An event as components emit it; sinks add timestamp and level */
export type TandemEventInput = DistributiveOmit<TandemEvent, 'timestamp' | 'level'>

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never

export const EVENT_LEVELS: Record<TandemEventName, EventLevel> = {
  environment_created: 'info',
  install_started: 'info',
  install_updating: 'info',
  install_skipped: 'info',
  command_started: 'debug',
  command_completed: 'debug',
  pipeline_started: 'debug',
  step_started: 'debug',
  step_completed: 'info',
  step_failed: 'error',
  pipeline_completed: 'debug',
}

/** Add timestamp and level to an emitted event */
export function stampEvent(input: TandemEventInput): TandemEvent {
  return {
    ...input,
    timestamp: new Date().toISOString(),
    level: EVENT_LEVELS[input.event],
  }
}

// ============================================================================
// Sinks
// ============================================================================

export interface EventSink {
  emit(event: TandemEventInput): void
}

/** Discards every event */
export const nullEventSink: EventSink = {
  emit() {},
}

/** Collects events in memory */
export class MemoryEventSink implements EventSink {
  readonly events: TandemEvent[] = []

  emit(event: TandemEventInput): void {
    this.events.push(stampEvent(event))
  }

  /** Names of the collected events, in order */
  names(): TandemEventName[] {
    return this.events.map((e) => e.event)
  }
}

/** Forward every event to each sink in turn */
export function fanOut(...sinks: EventSink[]): EventSink {
  return {
    emit(event) {
      for (const sink of sinks) {
        sink.emit(event)
      }
    },
  }
}

/** Options for creating a JSONL sink */
export interface JsonlEventSinkOptions {
  /** Path to write events (JSONL file) */
  outputPath: string
}

/**
 * Writes one JSON object per line to a file.
 */
export class JsonlEventSink implements EventSink {
  private readonly outputPath: string
  private stream: WriteStream | undefined
  private failure: Error | undefined
  private closed = false

  constructor(options: JsonlEventSinkOptions) {
    this.outputPath = options.outputPath
  }

  /**
   * Open the file, creating parent directories. The file is truncated.
   *
   * @throws The open error, e.g. when the path is a directory
   */
  async init(): Promise<void> {
    await mkdir(dirname(this.outputPath), { recursive: true })
    const stream = createWriteStream(this.outputPath, { flags: 'w' })
    stream.on('error', (error) => {
      if (!this.failure) this.failure = error
    })
    await new Promise<void>((resolve, reject) => {
      stream.once('open', () => resolve())
      stream.once('error', reject)
    })
    this.stream = stream
  }

  emit(event: TandemEventInput): void {
    if (this.closed || this.failure) return
    this.stream?.write(`${JSON.stringify(stampEvent(event))}\n`)
  }

  /**
   * Flush and close the file.
   *
   * @throws The first error the stream reported
   */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    const stream = this.stream
    this.stream = undefined
    if (stream && !stream.closed) {
      await new Promise<void>((resolve) => {
        stream.once('close', () => resolve())
        stream.end()
      })
    }
    if (this.failure) {
      throw this.failure
    }
  }
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Human-readable message for an event.
 */
export function formatEvent(event: TandemEventInput): string {
  switch (event.event) {
    case 'environment_created':
      return `Created virtual environment '${event.environment}' for project '${event.project}'`
    case 'install_started':
      return `Installing project '${event.project}' from '${event.path}' into virtual environment '${event.environment}'`
    case 'install_updating':
      return `Updating project '${event.project}' from '${event.path}' in virtual environment '${event.environment}'`
    case 'install_skipped':
      return `Project '${event.project}' at '${event.path}' already installed in virtual environment '${event.environment}'`
    case 'command_started':
      return `Running '${event.argv.join(' ')}' in virtual environment '${event.environment}'`
    case 'command_completed':
      return `Finished '${event.argv.join(' ')}' in ${event.durationMs}ms`
    case 'pipeline_started':
      return `Running pipeline '${event.pipeline}' with ${event.steps.length} step(s)`
    case 'step_started':
      return `Step ${event.index + 1}/${event.total}: ${event.step}`
    case 'step_completed':
      return event.stdout
    case 'step_failed':
      return `Step '${event.step}' failed: ${event.error}`
    case 'pipeline_completed':
      return `Pipeline '${event.pipeline}' finished ${event.steps} step(s) in ${event.totalDurationMs}ms`
  }
}
