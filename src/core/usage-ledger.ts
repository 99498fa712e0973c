import {appendFile, mkdir, readFile} from 'node:fs/promises'
import {dirname} from 'node:path'
import {z} from 'zod'
import {LedgerWriteError, errorMessage} from './errors.js'

export const usageRecordSchema = z.object({
  timestamp: z.string(),
  model: z.string(),
  inputTokens: z.number().int().nonnegative(),
  outputTokens: z.number().int().nonnegative(),
  cost: z.number().nonnegative(),
  query: z.string().optional(),
  sessionId: z.string().optional()
})

export type UsageRecord = Readonly<z.infer<typeof usageRecordSchema>>

export type UsageSummary = {
  totalQueries: number
  totalTokens: number
  averageTokensPerQuery: number
  totalCost: number
}

export interface LedgerSink {
  append(record: UsageRecord): Promise<void>
  readAll(): Promise<UsageRecord[]>
}

export function summarizeUsage(records: readonly UsageRecord[]): UsageSummary {
  let totalTokens = 0
  let totalCost = 0
  for (const record of records) {
    totalTokens += record.inputTokens + record.outputTokens
    totalCost += record.cost
  }

  return {
    totalQueries: records.length,
    totalTokens,
    averageTokensPerQuery: records.length > 0 ? totalTokens / records.length : 0,
    totalCost
  }
}

export function parseLedgerLines(raw: string): UsageRecord[] {
  const records: UsageRecord[] = []
  for (const line of raw.split('\n')) {
    if (!line.trim()) continue
    let value: unknown
    try {
      value = JSON.parse(line)
    } catch {
      continue
    }

    const parsed = usageRecordSchema.safeParse(value)
    if (parsed.success) records.push(parsed.data)
  }

  return records
}

export class InMemoryLedgerSink implements LedgerSink {
  private readonly records: UsageRecord[] = []

  async append(record: UsageRecord): Promise<void> {
    this.records.push(Object.freeze({...record}))
  }

  async readAll(): Promise<UsageRecord[]> {
    return [...this.records]
  }
}

/** One JSON object per line; appends are chained so records never interleave. */
export class JsonlLedgerSink implements LedgerSink {
  private pending: Promise<void> = Promise.resolve()

  constructor(readonly path: string) {}

  append(record: UsageRecord): Promise<void> {
    const line = `${JSON.stringify(record)}\n`
    const next = this.pending.then(async () => {
      await mkdir(dirname(this.path), {recursive: true})
      await appendFile(this.path, line, 'utf8')
    })
    this.pending = next.catch(() => undefined)
    return next
  }

  async readAll(): Promise<UsageRecord[]> {
    await this.pending
    let raw: string
    try {
      raw = await readFile(this.path, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) return []
      throw error
    }

    return parseLedgerLines(raw)
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export class UsageLedger {
  constructor(private readonly sink: LedgerSink) {}

  async record(usage: UsageRecord): Promise<void> {
    try {
      await this.sink.append(usage)
    } catch (error) {
      throw new LedgerWriteError(`Failed to write usage record: ${errorMessage(error)}`, {cause: error})
    }
  }

  records(): Promise<UsageRecord[]> {
    return this.sink.readAll()
  }

  async summaries(): Promise<UsageSummary> {
    return summarizeUsage(await this.records())
  }
}
