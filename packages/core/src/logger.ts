/**
 * Console logger for the planner.
 *
 * Entries below the configured level are dropped. Listeners see every entry
 * that passes the level filter, which lets a host surface planner warnings in
 * its own diagnostics.
 */

import { logLevelFromEnv, type LogLevelSetting } from './config'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogCategory = 'merge' | 'resolver' | 'calendar' | 'weather' | 'plan' | 'refresh'

export interface LogEntry {
  level: LogLevel
  category: LogCategory
  message: string
  metadata?: Record<string, unknown>
  timestamp: Date
}

type LogListener = (entry: LogEntry) => void

const levelRank: Record<LogLevelSetting, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

let minimumLevel: LogLevelSetting = logLevelFromEnv()
const listeners: Set<LogListener> = new Set()

export function setLogLevel(level: LogLevelSetting): void {
  minimumLevel = level
}

export function getLogLevel(): LogLevelSetting {
  return minimumLevel
}

export function addLogListener(listener: LogListener): () => void {
  listeners.add(listener)
  return () => {
    listeners.delete(listener)
  }
}

function write(entry: LogEntry): void {
  const line = `[fieldplan:${entry.category}] ${entry.message}`
  const args: unknown[] = entry.metadata ? [line, entry.metadata] : [line]
  switch (entry.level) {
    case 'debug':
      console.debug(...args)
      break
    case 'info':
      console.info(...args)
      break
    case 'warn':
      console.warn(...args)
      break
    case 'error':
      console.error(...args)
      break
  }
}

function log(level: LogLevel, category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
  if (levelRank[level] < levelRank[minimumLevel]) return
  const entry: LogEntry = { level, category, message, metadata, timestamp: new Date() }
  write(entry)
  listeners.forEach((listener) => listener(entry))
}

export const logger = {
  debug: (category: LogCategory, message: string, metadata?: Record<string, unknown>) =>
    log('debug', category, message, metadata),
  info: (category: LogCategory, message: string, metadata?: Record<string, unknown>) =>
    log('info', category, message, metadata),
  warn: (category: LogCategory, message: string, metadata?: Record<string, unknown>) =>
    log('warn', category, message, metadata),
  error: (category: LogCategory, message: string, metadata?: Record<string, unknown>) =>
    log('error', category, message, metadata),
}
