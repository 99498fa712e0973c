import {Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import {errorMessage} from '../core/errors.js'

export default class Config extends Command {
  static override description = 'Print resolved config'

  static override flags = {
    paths: Flags.boolean({description: 'print only the resolved file locations'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Config)
    const config = await loadConfig().catch((error: unknown) => this.error(errorMessage(error)))
    if (flags.paths) {
      this.log(`home: ${config.homeDir}`)
      this.log(`ledger: ${config.ledgerFile}`)
      this.log(`course data: ${config.dataFile}`)
      return
    }

    this.log(JSON.stringify(config, null, 2))
  }
}
