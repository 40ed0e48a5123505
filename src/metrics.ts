import initSqlJs from 'sql.js'

const SQL = await initSqlJs()

type SqlDatabase = InstanceType<Awaited<ReturnType<typeof initSqlJs>>['Database']>

export type MetricType = 'counter'

interface MetricDefinition {
  name: string
  type: MetricType
  help: string
  labels: string[]
}

const METRIC_DEFINITIONS: MetricDefinition[] = [
  {
    name: 'osu_requests_total',
    type: 'counter',
    help: 'Total osu! API requests',
    labels: ['status', 'operation']
  },
  {
    name: 'osu_retry_total',
    type: 'counter',
    help: 'Total retries performed for osu! API requests',
    labels: ['operation']
  },
  {
    name: 'pagination_next_total',
    type: 'counter',
    help: 'Next-page lookups by resource and outcome',
    labels: ['resource', 'outcome']
  }
]

export interface MetricSample {
  metric: string
  labels: Record<string, string>
  value: number
  updatedAt: number
}

export class MetricsRegistry {
  private db: SqlDatabase

  constructor() {
    this.db = new SQL.Database()
    this.initTables()
  }

  private initTables() {
    this.db.run(`
      CREATE TABLE IF NOT EXISTS metrics (
        metric TEXT NOT NULL,
        labels_hash TEXT NOT NULL,
        labels_json TEXT NOT NULL,
        value REAL NOT NULL,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY(metric, labels_hash)
      )
    `)
  }

  private static hashLabels(labels: Record<string, string>) {
    return Object.keys(labels)
      .sort()
      .map((key) => `${key}=${labels[key]}`)
      .join('|')
  }

  private getDefinition(name: string) {
    const def = METRIC_DEFINITIONS.find((metric) => metric.name === name)
    if (!def) {
      throw new Error(`Metric ${name} is not defined`)
    }
    return def
  }

  increment(name: string, value = 1, labels: Record<string, string> = {}) {
    const def = this.getDefinition(name)
    const normalizedLabels = this.normalizeLabels(def, labels)
    const hash = MetricsRegistry.hashLabels(normalizedLabels)

    this.db.run(
      `INSERT INTO metrics (metric, labels_hash, labels_json, value, updated_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(metric, labels_hash) DO UPDATE SET
         value = metrics.value + excluded.value,
         updated_at = excluded.updated_at`,
      [name, hash, JSON.stringify(normalizedLabels), value, Date.now()]
    )
  }

  list(): MetricSample[] {
    const [result] = this.db.exec('SELECT metric, labels_json, value, updated_at FROM metrics')
    if (!result) {
      return []
    }
    return result.values.map(([metric, labelsJson, value, updatedAt]) => ({
      metric: String(metric),
      labels: parseLabels(String(labelsJson)),
      value: Number(value),
      updatedAt: Number(updatedAt)
    }))
  }

  close() {
    this.db.close()
  }

  private normalizeLabels(def: MetricDefinition, labels: Record<string, string>) {
    const normalized: Record<string, string> = {}
    for (const key of def.labels) {
      normalized[key] = labels[key] ?? 'unknown'
    }
    return normalized
  }
}

function parseLabels(json: string): Record<string, string> {
  const parsed: unknown = JSON.parse(json)
  const labels: Record<string, string> = {}
  if (parsed && typeof parsed === 'object') {
    for (const [key, value] of Object.entries(parsed)) {
      labels[key] = String(value)
    }
  }
  return labels
}

export const metrics = new MetricsRegistry()
