import { configure, getLogger, reset } from '@logtape/logtape'
import type { LogRecord, Sink } from '@logtape/logtape'
import { trace } from '@opentelemetry/api'
import {
  ROOT_CATEGORY,
  validateLogLevel,
  validateEnvironment,
  type Environment,
  type LogLevel,
} from './constants.js'

export interface LoggerConfig {
  level?: LogLevel
  environment?: Environment
}

let configPromise: Promise<void> | null = null
let configured = false

// Prefixes and addresses are bigint-valued.
function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) =>
    typeof val === 'bigint' ? val.toString() : val
  )
}

function renderMessage(record: LogRecord): string {
  return record.message.map((part) => (typeof part === 'string' ? part : String(part))).join('')
}

function hasProperties(record: LogRecord): boolean {
  return Object.keys(record.properties).length > 0
}

function activeSpanIds(): { trace_id: string; span_id: string } | undefined {
  const span = trace.getActiveSpan()
  if (!span) return undefined
  const { traceId, spanId } = span.spanContext()
  return { trace_id: traceId, span_id: spanId }
}

/**
 * One sink per environment. Production writes a JSON object per line to
 * stdout, stamped with the active span's ids; development and test print a
 * single readable line to the console.
 */
function createSink(environment: Environment): Sink {
  if (environment === 'production') {
    return (record) => {
      const line = toJson({
        timestamp: record.timestamp,
        level: record.level,
        category: record.category.join('.'),
        message: renderMessage(record),
        ...(hasProperties(record) ? { properties: record.properties } : {}),
        ...activeSpanIds(),
      })
      process.stdout.write(line + '\n')
    }
  }

  return (record) => {
    const time = new Date(record.timestamp).toISOString().slice(11, 23)
    const props = hasProperties(record) ? ` ${toJson(record.properties)}` : ''
    console.log(
      `${time} ${record.level.toUpperCase()} ${record.category.join('.')}: ${renderMessage(record)}${props}`
    )
  }
}

/**
 * Route every `flowgate.*` category to the sink for the current environment.
 *
 * Level and environment fall back to `LOG_LEVEL` and `NODE_ENV`. Once a call
 * has succeeded, later calls do nothing.
 */
export async function configureLogger(config?: LoggerConfig): Promise<void> {
  if (configured) return
  if (configPromise) return configPromise

  configPromise = applyConfig(config)
    .then(() => {
      configured = true
    })
    .catch((err: unknown) => {
      configPromise = null
      throw err
    })
  return configPromise
}

async function applyConfig(config?: LoggerConfig): Promise<void> {
  const level: LogLevel = config?.level ?? validateLogLevel(process.env.LOG_LEVEL) ?? 'info'
  const environment =
    config?.environment ?? validateEnvironment(process.env.NODE_ENV) ?? 'development'

  await configure({
    sinks: { main: createSink(environment) },
    loggers: [
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['main'] },
      { category: [ROOT_CATEGORY], lowestLevel: level, sinks: ['main'] },
    ],
  })
}

/**
 * @internal
 * Drop the LogTape configuration so `configureLogger` can run again.
 */
export async function resetLogger(): Promise<void> {
  await reset()
  configPromise = null
  configured = false
}

export { getLogger }
