import chalk from 'chalk'
import type { Finding, Severity } from '../types/finding.js'

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

interface LoggerConfig {
  level: LogLevel
  quiet: boolean
}

interface LevelStyle {
  rank: number
  color: (text: string) => string
  write: (...data: unknown[]) => void
}

// console methods are looked up per call so test spies see the output
const LEVELS: Record<LogLevel, LevelStyle> = {
  debug: { rank: 0, color: chalk.gray, write: (...data) => console.debug(...data) },
  info: { rank: 1, color: chalk.blue, write: (...data) => console.info(...data) },
  warn: { rank: 2, color: chalk.yellow, write: (...data) => console.warn(...data) },
  error: { rank: 3, color: chalk.red, write: (...data) => console.error(...data) }
}

/**
 * Level a finding of each severity is logged at
 */
export const SEVERITY_LOG_LEVEL: Readonly<Record<Severity, Exclude<LogLevel, 'debug'>>> = {
  critical: 'error',
  high: 'error',
  medium: 'warn',
  low: 'info',
  info: 'info'
}

const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
  critical: chalk.bgRed.white,
  high: chalk.red,
  medium: chalk.yellow,
  low: chalk.cyan,
  info: chalk.gray
}

let config: LoggerConfig = {
  level: 'info',
  quiet: false
}

/**
 * Configure the logger. Quiet mode keeps errors only.
 */
export function configureLogger(options: Partial<LoggerConfig>): void {
  config = { ...config, ...options }
}

/**
 * Write one timestamped line at `level`
 */
export function log(level: LogLevel, message: string, ...args: unknown[]): void {
  if (config.quiet && level !== 'error') {
    return
  }
  const style = LEVELS[level]
  if (style.rank < LEVELS[config.level].rank) {
    return
  }
  style.write(style.color(`[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`), ...args)
}

export function success(message: string): void {
  if (!config.quiet) {
    console.log(chalk.green(message))
  }
}

/**
 * Print a finding with its severity colour
 */
export function finding(item: Finding, file: string): void {
  if (config.quiet) {
    return
  }

  const label = SEVERITY_COLORS[item.severity](`[${item.severity.toUpperCase()}]`)
  console.log(`${label} ${item.message} ${chalk.dim(`(${item.category}, ${file})`)}`)
}

/**
 * Logger interface for named loggers
 */
export interface Logger {
  debug: (message: string, ...args: unknown[]) => void
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
}

/**
 * Create a logger that prefixes every message with `[name]`
 */
export function createLogger(name: string): Logger {
  const at = (level: LogLevel) =>
    (message: string, ...args: unknown[]) => log(level, `[${name}] ${message}`, ...args)

  return {
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error')
  }
}
