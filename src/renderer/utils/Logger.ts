/**
 * Logger Utility
 * Centralized logging with in-memory storage and console output
 *
 * Logs are stored in memory for quick access and export, and mirrored to the console.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
  timestamp: string
  level: LogLevel
  module: string
  message: string
  data?: unknown
}

export interface ModuleLogger {
  debug: (message: string, data?: unknown) => void
  info: (message: string, data?: unknown) => void
  warn: (message: string, data?: unknown) => void
  error: (message: string, data?: unknown) => void
}

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

export class Logger {
  private logs: LogEntry[] = []
  private maxLogs: number
  private logLevel: LogLevel = 'debug'

  constructor(maxLogs: number = 5000) {
    this.maxLogs = maxLogs
  }

  /**
   * Set minimum log level
   */
  setLogLevel(level: LogLevel) {
    this.logLevel = level
  }

  getLogLevel(): LogLevel {
    return this.logLevel
  }

  /**
   * Create a logger for a specific module
   */
  createModuleLogger(module: string): ModuleLogger {
    return {
      debug: (message, data) => this.log('debug', module, message, data),
      info: (message, data) => this.log('info', module, message, data),
      warn: (message, data) => this.log('warn', module, message, data),
      error: (message, data) => this.log('error', module, message, data),
    }
  }

  private log(level: LogLevel, module: string, message: string, data?: unknown) {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.logLevel]) {
      return
    }

    const sanitizedData = data !== undefined ? this.sanitizeData(data) : undefined

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module,
      message,
      data: sanitizedData
    }

    this.logs.push(entry)

    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs)
    }

    const consoleMsg = `[${entry.timestamp}] [${level.toUpperCase()}] [${module}] ${message}`

    switch (level) {
      case 'debug':
        console.debug(consoleMsg, data !== undefined ? data : '')
        break
      case 'info':
        console.info(consoleMsg, data !== undefined ? data : '')
        break
      case 'warn':
        console.warn(consoleMsg, data !== undefined ? data : '')
        break
      case 'error':
        console.error(consoleMsg, data !== undefined ? data : '')
        break
    }
  }

  /**
   * Sanitize data for logging (handle circular references, etc.)
   */
  sanitizeData(data: unknown, depth: number = 0): unknown {
    if (depth > 5) {
      return '[max depth exceeded]'
    }

    if (data === null || data === undefined) {
      return data
    }

    if (data instanceof Error) {
      return {
        _type: 'Error',
        name: data.name,
        message: data.message,
        stack: data.stack?.split('\n').slice(0, 5).join('\n')
      }
    }

    if (Array.isArray(data)) {
      return data.map(item => this.sanitizeData(item, depth + 1))
    }

    if (typeof data === 'function') {
      return '[function]'
    }

    if (typeof data === 'object') {
      const sanitized: Record<string, unknown> = {}
      for (const [key, value] of Object.entries(data)) {
        sanitized[key] = typeof value === 'function'
          ? '[function]'
          : this.sanitizeData(value, depth + 1)
      }
      return sanitized
    }

    if (typeof data === 'bigint' || typeof data === 'symbol') {
      return String(data)
    }

    return data
  }

  /**
   * Get all logs from memory
   */
  getLogs(): LogEntry[] {
    return [...this.logs]
  }

  /**
   * Get logs as formatted text
   */
  getLogsAsText(): string {
    const lines: string[] = [
      '='.repeat(80),
      'Call Screen Debug Log',
      `Generated: ${new Date().toISOString()}`,
      `Total Entries: ${this.logs.length}`,
      '='.repeat(80),
      ''
    ]

    for (const entry of this.logs) {
      let line = `[${entry.timestamp}] [${entry.level.toUpperCase().padEnd(5)}] [${entry.module}] ${entry.message}`

      if (entry.data !== undefined) {
        const dataStr = JSON.stringify(entry.data, null, 2)
        if (dataStr.length < 500) {
          line += `\n    Data: ${dataStr}`
        } else {
          line += `\n    Data: ${dataStr.substring(0, 500)}... (truncated)`
        }
      }

      lines.push(line)
    }

    return lines.join('\n')
  }

  /**
   * Clear all in-memory logs
   */
  clearLogs() {
    this.logs = []
  }
}

// Export singleton instance
export const logger = new Logger()

// Export module loggers for convenience
export const CallLog = logger.createModuleLogger('Call')
export const AudioLog = logger.createModuleLogger('Audio')
export const VideoLog = logger.createModuleLogger('Video')
export const DismissLog = logger.createModuleLogger('Dismiss')
export const UILog = logger.createModuleLogger('UI')
