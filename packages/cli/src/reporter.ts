/**
 * Console reporter: renders lifecycle events for a person at a terminal.
 */

import type { Ora } from 'ora'

import { EVENT_LEVELS, type EventSink, type TandemEventInput, formatEvent } from '@tandem/core'

import { colors, createSpinner, symbols } from './ui.js'

export interface ConsoleReporterOptions {
  /** Print debug events too */
  verbose?: boolean | undefined
  /** Show a spinner while an install runs instead of a static line */
  spinner?: boolean | undefined
}

export class ConsoleReporter implements EventSink {
  private readonly verbose: boolean
  private readonly useSpinner: boolean
  private spinner: Ora | undefined

  constructor(options: ConsoleReporterOptions = {}) {
    this.verbose = options.verbose ?? false
    this.useSpinner = options.spinner ?? false
  }

  emit(event: TandemEventInput): void {
    // An install ends with whatever the project does next
    this.settle(event.event !== 'step_failed')

    const level = EVENT_LEVELS[event.event]
    if (level === 'debug' && !this.verbose) return
    const message = formatEvent(event)

    switch (event.event) {
      case 'install_started':
      case 'install_updating':
        if (this.useSpinner) {
          this.spinner = createSpinner(message).start()
        } else {
          console.log(`${symbols.info} ${message}`)
        }
        return
      case 'install_skipped':
        console.log(`${symbols.bullet} ${colors.muted(message)}`)
        return
      case 'environment_created':
      case 'pipeline_completed':
        console.log(`${symbols.success} ${message}`)
        return
      case 'step_started':
        console.log(`${symbols.pointer} ${colors.code(message)}`)
        return
      case 'step_completed': {
        const output = message.trimEnd()
        if (output) console.log(output)
        return
      }
      case 'step_failed':
        console.error(`${symbols.error} ${colors.error(message)}`)
        return
      default:
        console.log(level === 'debug' ? colors.muted(message) : `${symbols.info} ${message}`)
    }
  }

  /**
   * Stop a running spinner, marking the install as succeeded or failed.
   */
  finish(ok: boolean): void {
    this.settle(ok)
  }

  private settle(ok: boolean): void {
    if (!this.spinner) return
    if (ok) {
      this.spinner.succeed()
    } else {
      this.spinner.fail()
    }
    this.spinner = undefined
  }
}
