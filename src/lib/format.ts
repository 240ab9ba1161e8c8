/**
 * Output formatting utilities
 * YAML-like format with optional ANSI styling
 */

import type { DispatchError } from './operations/router.js'

import { ClassifiedError } from './execution/errors.js'

// ANSI escape codes
const ANSI = {
  bold: '\u001B[1m',
  cyan: '\u001B[36m',
  dim: '\u001B[2m',
  green: '\u001B[32m',
  red: '\u001B[31m',
  reset: '\u001B[0m',
  yellow: '\u001B[33m',
}

type StyleFn = (text: string) => string

interface Styles {
  boolean: StyleFn
  category: StyleFn
  error: StyleFn
  null: StyleFn
  number: StyleFn
  string: StyleFn
}

function createStyles(useColors: boolean): Styles {
  if (!useColors) {
    const identity: StyleFn = (text) => text
    return {
      boolean: identity,
      category: identity,
      error: identity,
      null: identity,
      number: identity,
      string: identity,
    }
  }

  return {
    boolean: (text) => `${ANSI.yellow}${text}${ANSI.reset}`,
    category: (text) => `${ANSI.bold}${text}${ANSI.reset}`,
    error: (text) => `${ANSI.red}${text}${ANSI.reset}`,
    null: (text) => `${ANSI.dim}${text}${ANSI.reset}`,
    number: (text) => `${ANSI.cyan}${text}${ANSI.reset}`,
    string: (text) => `${ANSI.green}${text}${ANSI.reset}`,
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Format a value with appropriate color based on type
 */
function formatValue(value: unknown, styles: Styles): string {
  if (value === null) {
    return styles.null('null')
  }

  if (value === undefined) {
    return styles.null('undefined')
  }

  if (typeof value === 'boolean') {
    return styles.boolean(String(value))
  }

  if (typeof value === 'number') {
    return styles.number(String(value))
  }

  if (typeof value === 'string') {
    // Multi-line strings get special handling
    if (value.includes('\n')) {
      return styles.string(`"${value.replaceAll('\n', String.raw`\n`)}"`)
    }

    return styles.string(`"${value}"`)
  }

  // Nested arrays (SQL rows) stay on one line
  return JSON.stringify(value)
}

/**
 * Format data in YAML-like format
 *
 * Output format:
 *   **category**:
 *     label: (colored) value
 */
export function formatYamlLike(
  data: unknown,
  options: { styled?: boolean } = {}
): string {
  const { styled = true } = options
  const styles = createStyles(styled)
  const lines: string[] = []

  function formatObject(obj: Record<string, unknown>, indent: number): void {
    const prefix = '  '.repeat(indent)

    for (const [key, value] of Object.entries(obj)) {
      if (Array.isArray(value)) {
        if (value.length === 0) {
          lines.push(`${prefix}${key}: []`)
        } else if (isRecord(value[0])) {
          lines.push(`${prefix}${key}:`)
          formatList(value, indent + 1)
        } else {
          lines.push(`${prefix}${key}: [${value.map(v => formatValue(v, styles)).join(', ')}]`)
        }
      } else if (isRecord(value)) {
        lines.push(`${prefix}${styles.category(key)}:`)
        formatObject(value, indent + 1)
      } else {
        lines.push(`${prefix}${key}: ${formatValue(value, styles)}`)
      }
    }
  }

  function formatList(items: unknown[], indent: number): void {
    const prefix = '  '.repeat(indent)

    for (const item of items) {
      if (isRecord(item)) {
        lines.push(`${prefix}-`)
        formatObject(item, indent + 1)
      } else {
        lines.push(`${prefix}- ${formatValue(item, styles)}`)
      }
    }
  }

  if (isRecord(data)) {
    formatObject(data, 0)
  } else if (Array.isArray(data)) {
    if (data.length === 0) {
      lines.push('[]')
    } else {
      formatList(data, 0)
    }
  } else {
    lines.push(formatValue(data, styles))
  }

  return lines.join('\n')
}

/**
 * Format a dispatch failure: category, message and remediation hint
 */
export function formatDispatchError(
  error: DispatchError,
  options: { styled?: boolean } = {}
): string {
  const { styled = true } = options
  const styles = createStyles(styled)

  if (!(error instanceof ClassifiedError)) {
    return `${styles.category('error')}: ${styles.error(error.message)}`
  }

  const lines = [
    `${styles.category('error')}: ${styles.error(error.message)}`,
    `category: ${error.category}`,
    `retryable: ${styles.boolean(String(error.retryable))}`,
  ]

  if (error.exhausted) {
    lines.push(`attempts: ${styles.number(String(error.attempts))} (${error.attemptCategories.join(', ')})`)
  }

  lines.push(`hint: ${error.hint}`)
  return lines.join('\n')
}
