/**
 * Verbosity levels for diagnostic output
 *
 * -1 (silent):  Errors only
 *  0 (normal):  Standard output (default)
 *  1 (verbose): + API endpoints called, retries, client initialization
 *  2 (debug):   + Request bodies, response data, chunk and batch progress
 *  3 (trace):   + Timing breakdown, config resolution
 *
 * Everything except `info` goes to stderr, so stdout
 * stays reserved for protocol traffic when running as an MCP or RPC server.
 */
export type VerbosityLevel = -1 | 0 | 1 | 2 | 3

export const VERBOSITY = {
  DEBUG: 2 as VerbosityLevel,
  NORMAL: 0 as VerbosityLevel,
  SILENT: -1 as VerbosityLevel,
  TRACE: 3 as VerbosityLevel,
  VERBOSE: 1 as VerbosityLevel,
}

interface TimingEntry {
  label: string
  start: number
}

/**
 * Sink for log lines; swapped in tests to capture output
 */
export type LogWriter = (...args: unknown[]) => void

class Logger {
  private level: VerbosityLevel = VERBOSITY.NORMAL
  private out: LogWriter = (...args) => console.log(...args)
  private err: LogWriter = (...args) => console.error(...args)
  private timings: Map<string, TimingEntry> = new Map()

  /**
   * API request being made (level 1+)
   */
  apiCall(method: string, endpoint: string): void {
    if (this.level >= VERBOSITY.VERBOSE) {
      this.err(`  → ${method} ${endpoint}`)
    }
  }

  /**
   * API response received (level 1+)
   */
  apiResponse(status: number, statusText: string, durationMs?: number): void {
    if (this.level >= VERBOSITY.VERBOSE) {
      const timing = durationMs === undefined ? '' : ` (${durationMs}ms)`
      this.err(`  ← ${status} ${statusText}${timing}`)
    }
  }

  /**
   * Batch progress (level 2+)
   */
  batchProgress(completed: number, total: number, failed: number): void {
    if (this.level >= VERBOSITY.DEBUG) {
      this.err(`    Batch ${completed}/${total} done (${failed} failed)`)
    }
  }

  /**
   * Chunk fetched during result assembly (level 2+)
   */
  chunk(index: number, total: number, rows: number): void {
    if (this.level >= VERBOSITY.DEBUG) {
      this.err(`    Chunk ${index + 1}/${total}: ${rows} rows`)
    }
  }

  /**
   * Client handle lifecycle (level 1+)
   */
  clientInit(scope: string, state: string, detail?: string): void {
    if (this.level >= VERBOSITY.VERBOSE) {
      const suffix = detail ? `: ${detail}` : ''
      this.err(`  ⚙ ${scope} client ${state}${suffix}`)
    }
  }

  /**
   * Config resolution step (level 3+)
   */
  configResolution(source: string, value: unknown): void {
    if (this.level >= VERBOSITY.TRACE) {
      const preview = this.truncateJson(value, 100)
      this.err(`      ⚙️ Config [${source}]: ${preview}`)
    }
  }

  /**
   * General debug message (level 2+)
   */
  debug(...args: unknown[]): void {
    if (this.level >= VERBOSITY.DEBUG) {
      this.err('    [DEBUG]', ...args)
    }
  }

  /**
   * Error message (always shown, even in silent mode)
   */
  error(...args: unknown[]): void {
    this.err(...args)
  }

  /**
   * Get current verbosity level
   */
  getLevel(): VerbosityLevel {
    return this.level
  }

  /**
   * Standard info message (level 0+)
   * Goes to stdout for normal output
   */
  info(...args: unknown[]): void {
    if (this.level >= VERBOSITY.NORMAL) {
      this.out(...args)
    }
  }

  /**
   * Check if a level is enabled
   */
  isEnabled(level: VerbosityLevel): boolean {
    return this.level >= level
  }

  /**
   * Request body being sent (level 2+)
   */
  requestBody(body: unknown): void {
    if (this.level >= VERBOSITY.DEBUG) {
      const preview = this.truncateJson(body, 500)
      this.err(`    Body: ${preview}`)
    }
  }

  /**
   * Response data received (level 2+)
   */
  responseData(data: unknown): void {
    if (this.level >= VERBOSITY.DEBUG) {
      const preview = this.truncateJson(data, 500)
      this.err(`    Response: ${preview}`)
    }
  }

  /**
   * Retry about to happen (level 1+)
   */
  retry(label: string, attempt: number, maxAttempts: number, delayMs: number, reason: string): void {
    if (this.level >= VERBOSITY.VERBOSE) {
      const remaining = maxAttempts - attempt
      this.err(`  ↻ ${label}: attempt ${attempt}/${maxAttempts} failed (${reason}), ${remaining} left, retrying in ${delayMs}ms`)
    }
  }

  /**
   * Set verbosity level
   */
  setLevel(level: VerbosityLevel): void {
    this.level = level
  }

  /**
   * Redirect output, returns a function restoring the previous writers
   */
  setWriters(writers: { err?: LogWriter; out?: LogWriter }): () => void {
    const previous = { err: this.err, out: this.out }
    if (writers.err) this.err = writers.err
    if (writers.out) this.out = writers.out
    return () => {
      this.err = previous.err
      this.out = previous.out
    }
  }

  /**
   * End timing an operation (level 3+)
   */
  timeEnd(id: string): void {
    if (this.level >= VERBOSITY.TRACE) {
      const entry = this.timings.get(id)
      if (entry) {
        const duration = (performance.now() - entry.start).toFixed(2)
        this.err(`      ⏱ ${entry.label}: ${duration}ms`)
        this.timings.delete(id)
      }
    }
  }

  /**
   * Start timing an operation (level 3+)
   */
  timeStart(id: string, label: string): void {
    if (this.level >= VERBOSITY.TRACE) {
      this.timings.set(id, { label, start: performance.now() })
      this.err(`      ⏱ ${label} started`)
    }
  }

  /**
   * General trace message (level 3+)
   */
  trace(...args: unknown[]): void {
    if (this.level >= VERBOSITY.TRACE) {
      this.err('      [TRACE]', ...args)
    }
  }

  /**
   * General verbose message (level 1+)
   */
  verbose(...args: unknown[]): void {
    if (this.level >= VERBOSITY.VERBOSE) {
      this.err('  ', ...args)
    }
  }

  /**
   * Warning message (level 0+)
   */
  warn(...args: unknown[]): void {
    if (this.level >= VERBOSITY.NORMAL) {
      this.err('Warning:', ...args)
    }
  }

  private truncateJson(data: unknown, maxLength: number): string {
    try {
      const json = JSON.stringify(data)
      if (json === undefined) return String(data)
      if (json.length <= maxLength) return json
      return json.slice(0, maxLength) + '...'
    } catch {
      return String(data)
    }
  }
}

// Singleton instance
export const logger = new Logger()

function isVerbosityLevel(value: number): value is VerbosityLevel {
  return Number.isInteger(value) && value >= -1 && value <= 3
}

/**
 * Resolve verbosity level from multiple sources
 * Priority: flag > env > config > default
 */
export function resolveVerbosity(
  flagVerbose?: number,
  flagSilent?: boolean,
  configVerbose?: number
): VerbosityLevel {
  if (flagSilent) {
    return VERBOSITY.SILENT
  }

  // --verbose 1..3
  if (flagVerbose !== undefined && flagVerbose > 0) {
    const capped = Math.min(flagVerbose, 3)
    return isVerbosityLevel(capped) ? capped : VERBOSITY.TRACE
  }

  // LAKEOPS_VERBOSE=0|1|2|3 or LAKEOPS_DEBUG=1
  if (process.env.LAKEOPS_DEBUG === '1' || process.env.LAKEOPS_DEBUG === 'true') {
    return VERBOSITY.DEBUG
  }

  if (process.env.LAKEOPS_VERBOSE) {
    const envLevel = Number.parseInt(process.env.LAKEOPS_VERBOSE, 10)
    if (isVerbosityLevel(envLevel)) {
      return envLevel
    }
  }

  if (configVerbose !== undefined && isVerbosityLevel(configVerbose)) {
    return configVerbose
  }

  return VERBOSITY.NORMAL
}
