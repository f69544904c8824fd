export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogFields = Record<string, unknown>
export type LogSink = (line: string) => void

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value)
}

function serializeError(err: unknown): LogFields {
  if (!(err instanceof Error)) return { error: String(err) }
  const code = 'code' in err && typeof err.code === 'string' ? { error_code: err.code } : {}
  return {
    error_name: err.name,
    error_message: err.message,
    ...code,
    error_stack: err.stack,
  }
}

// Amounts are bigint throughout; JSON.stringify rejects them.
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
}

export class StructuredLogger {
  private readonly level: LogLevel
  private readonly sink: LogSink

  constructor(private readonly baseFields: LogFields = {}, options: LoggerOptions = {}) {
    this.level = options.level ?? 'info'
    this.sink = options.sink ?? ((line) => console.log(line))
  }

  child(fields: LogFields): StructuredLogger {
    return new StructuredLogger({ ...this.baseFields, ...fields }, { level: this.level, sink: this.sink })
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]
  }

  private emit(level: LogLevel, message: string, fields?: LogFields, err?: unknown) {
    if (!this.isEnabled(level)) return
    const payload: LogFields = {
      ts: new Date().toISOString(),
      level,
      msg: message,
      ...this.baseFields,
      ...(fields || {}),
      ...(err ? serializeError(err) : {}),
    }
    // JSON lines for machine parsing in log pipelines.
    this.sink(JSON.stringify(payload, jsonReplacer))
  }

  debug(message: string, fields?: LogFields) { this.emit('debug', message, fields) }
  info(message: string, fields?: LogFields) { this.emit('info', message, fields) }
  warn(message: string, fields?: LogFields, err?: unknown) { this.emit('warn', message, fields, err) }
  error(message: string, fields?: LogFields, err?: unknown) { this.emit('error', message, fields, err) }
}

export function createLogger(baseFields: LogFields = {}, options: LoggerOptions = {}): StructuredLogger {
  return new StructuredLogger(baseFields, options)
}

/** Logger that drops everything; the default for embedded engines. */
export function createSilentLogger(): StructuredLogger {
  return new StructuredLogger({}, { level: 'error', sink: () => {} })
}

export type Labels = Record<string, string>

interface Series<T> {
  labels: Labels
  data: T
}

/** Series identity: label pairs in key order, so {a, b} and {b, a} share one series. */
function seriesKey(labels: Labels = {}): string {
  return JSON.stringify(Object.entries(labels).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)))
}

/** Monotonic count per label set. */
export class Counter {
  private readonly series = new Map<string, Series<number>>()

  constructor(
    readonly name: string,
    readonly help: string,
  ) {}

  inc(labels: Labels = {}, by = 1): void {
    const key = seriesKey(labels)
    const entry = this.series.get(key)
    if (entry) entry.data += by
    else this.series.set(key, { labels: { ...labels }, data: by })
  }

  get(labels: Labels = {}): number {
    return this.series.get(seriesKey(labels))?.data ?? 0
  }

  snapshot(): CounterSample[] {
    return Array.from(this.series.values(), ({ labels, data }) => ({ labels, value: data }))
  }
}

export interface CounterSample {
  labels: Labels
  value: number
}

export interface HistogramSample {
  labels: Labels
  count: number
  sum: number
  avg: number
  min: number
  max: number
  unit: string
}

interface Summary {
  count: number
  sum: number
  min: number
  max: number
}

/** Count, sum and range of observed values per label set. */
export class Histogram {
  private readonly series = new Map<string, Series<Summary>>()

  constructor(
    readonly name: string,
    readonly help: string,
    readonly unit = 'ms',
  ) {}

  observe(value: number, labels: Labels = {}): void {
    const key = seriesKey(labels)
    const entry = this.series.get(key)
    if (!entry) {
      this.series.set(key, { labels: { ...labels }, data: { count: 1, sum: value, min: value, max: value } })
      return
    }
    const summary = entry.data
    summary.count += 1
    summary.sum += value
    if (value < summary.min) summary.min = value
    if (value > summary.max) summary.max = value
  }

  /** Starts a timer on `clock`; calling the result records and returns the elapsed time. */
  startTimer(clock: () => number = () => performance.now()): (labels?: Labels) => number {
    const started = clock()
    return (labels) => {
      const elapsed = clock() - started
      this.observe(elapsed, labels)
      return elapsed
    }
  }

  snapshot(): HistogramSample[] {
    return Array.from(this.series.values(), ({ labels, data }) => ({
      labels,
      ...data,
      avg: data.sum / data.count,
      unit: this.unit,
    }))
  }
}

export interface MetricsSnapshot {
  counters: Array<{ name: string; help: string; series: CounterSample[] }>
  histograms: Array<{ name: string; help: string; series: HistogramSample[] }>
}

function getOrCreate<T>(registry: Map<string, T>, name: string, create: () => T): T {
  let metric = registry.get(name)
  if (!metric) {
    metric = create()
    registry.set(name, metric)
  }
  return metric
}

/** Named counters and histograms. A name is registered once; later lookups return the same metric. */
export class MetricsRegistry {
  private readonly counters = new Map<string, Counter>()
  private readonly histograms = new Map<string, Histogram>()

  counter(name: string, help: string): Counter {
    return getOrCreate(this.counters, name, () => new Counter(name, help))
  }

  histogram(name: string, help: string, unit = 'ms'): Histogram {
    return getOrCreate(this.histograms, name, () => new Histogram(name, help, unit))
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: Array.from(this.counters.values(), (c) => ({ name: c.name, help: c.help, series: c.snapshot() })),
      histograms: Array.from(this.histograms.values(), (h) => ({ name: h.name, help: h.help, series: h.snapshot() })),
    }
  }
}

export function createMetricsRegistry(): MetricsRegistry {
  return new MetricsRegistry()
}
