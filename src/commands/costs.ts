import {Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import {loadUsageSummary, renderUsageSummary} from '../core/cost-report.js'
import {errorMessage} from '../core/errors.js'

export default class Costs extends Command {
  static override description = 'Summarize token usage and cost from the usage ledger'

  static override flags = {
    ledger: Flags.string({description: 'path to a usage ledger (JSONL) instead of the configured one'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Costs)
    const ledgerPath =
      flags.ledger ?? (await loadConfig().catch((error: unknown) => this.error(errorMessage(error)))).ledgerFile

    try {
      const summary = await loadUsageSummary(ledgerPath)
      this.log(renderUsageSummary(summary))
    } catch (error) {
      this.warn(`Could not read usage ledger '${ledgerPath}': ${errorMessage(error)}`)
    }
  }
}
