import {JsonlLedgerSink, UsageLedger, type UsageSummary} from './usage-ledger.js'

const RULE = '='.repeat(60)

export async function loadUsageSummary(ledgerPath: string): Promise<UsageSummary> {
  return new UsageLedger(new JsonlLedgerSink(ledgerPath)).summaries()
}

export function renderUsageSummary(summary: UsageSummary): string {
  return [
    RULE,
    'TOKEN USAGE SUMMARY',
    RULE,
    `Total spent: $${summary.totalCost.toFixed(4)}`,
    `Total queries: ${summary.totalQueries}`,
    `Total tokens: ${summary.totalTokens.toLocaleString('en-US')}`,
    `Avg tokens/query: ${Math.round(summary.averageTokensPerQuery)}`,
    RULE
  ].join('\n')
}
