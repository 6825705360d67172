/**
 * Terminal UI utilities for the tandem CLI.
 *
 * Sparse color, unicode symbols for status, muted secondary text.
 */

import chalk from 'chalk'
import figures from 'figures'
import ora, { type Ora } from 'ora'

// ═══════════════════════════════════════════════════════════════════════════
// Color Palette
// ═══════════════════════════════════════════════════════════════════════════

export const colors = {
  success: chalk.hex('#10b981'), // emerald
  info: chalk.hex('#6366f1'), // indigo
  error: chalk.hex('#ef4444'), // red
  // Secondary text, debug events
  muted: chalk.hex('#6b7280'), // gray-500
  // Commands and step descriptors
  code: chalk.hex('#a78bfa'), // violet-400
  dim: chalk.hex('#4b5563'), // gray-600
}

// ═══════════════════════════════════════════════════════════════════════════
// Symbols
// ═══════════════════════════════════════════════════════════════════════════

export const symbols = {
  success: colors.success(figures.tick),
  error: colors.error(figures.cross),
  info: colors.info(figures.info),
  pointer: colors.muted(figures.pointer),
  bullet: colors.muted(figures.bullet),
}

// ═══════════════════════════════════════════════════════════════════════════
// Spinner
// ═══════════════════════════════════════════════════════════════════════════

export function createSpinner(text: string): Ora {
  return ora({
    text: colors.muted(text),
    spinner: 'dots',
    color: 'gray',
  })
}

// ═══════════════════════════════════════════════════════════════════════════
// Layout Components
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Print a success message with checkmark
 */
export function success(text: string): void {
  console.log(`${symbols.success} ${text}`)
}

/**
 * Print a label/value line
 */
export function info(label: string, value: string): void {
  console.log(`  ${colors.muted(label)} ${value}`)
}

/**
 * Print a summary block at the end of a command
 */
export function summaryBlock(items: { label: string; value: string }[]): void {
  console.log()
  console.log(colors.dim('  ─'.repeat(40)))
  console.log()

  for (const item of items) {
    console.log(`  ${colors.muted(item.label.padEnd(12))} ${item.value}`)
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Format a file path for display: a leading home directory becomes `~`.
 */
export function formatPath(filePath: string, home = process.env['HOME'] ?? ''): string {
  if (home && (filePath === home || filePath.startsWith(`${home}/`))) {
    return `~${filePath.slice(home.length)}`
  }
  return filePath
}

/**
 * Format duration in ms to human readable
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }
  return `${(ms / 1000).toFixed(1)}s`
}
