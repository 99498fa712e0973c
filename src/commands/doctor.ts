import {Command, Flags} from '@oclif/core'
import {existsSync} from 'node:fs'
import process from 'node:process'
import {loadConfig} from '../config/load-config.js'
import {getGlobalEnvPath} from '../config/paths.js'
import {errorMessage} from '../core/errors.js'

type DoctorReport = {
  cliVersion: string
  nodeVersion: string
  platform: string
  cwd: string
  home: string
  globalEnvPath: string
  globalEnvExists: boolean
  localEnvExists: boolean
  ledgerPath: string
  ledgerExists: boolean
  dataPath: string
  dataExists: boolean
  env: {
    hasOpenAIKey: boolean
    hasOpenAIModel: boolean
    hasOpenAIBaseURL: boolean
  }
  provider: string
}

export default class Doctor extends Command {
  static override description = 'Print runtime diagnostics for config and environment'

  static override flags = {
    json: Flags.boolean({description: 'print JSON output'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Doctor)
    const config = await loadConfig().catch((error: unknown) => this.error(errorMessage(error)))

    const report: DoctorReport = {
      cliVersion: this.config.pjson.version,
      nodeVersion: process.version,
      platform: `${process.platform}-${process.arch}`,
      cwd: process.cwd(),
      home: config.homeDir,
      globalEnvPath: getGlobalEnvPath(config.homeDir),
      globalEnvExists: existsSync(getGlobalEnvPath(config.homeDir)),
      localEnvExists: existsSync(`${process.cwd()}/.env`),
      ledgerPath: config.ledgerFile,
      ledgerExists: existsSync(config.ledgerFile),
      dataPath: config.dataFile,
      dataExists: existsSync(config.dataFile),
      env: {
        hasOpenAIKey: Boolean(process.env.OPENAI_API_KEY),
        hasOpenAIModel: Boolean(process.env.OPENAI_MODEL),
        hasOpenAIBaseURL: Boolean(process.env.OPENAI_BASE_URL)
      },
      provider: config.provider
    }

    if (flags.json) {
      this.log(JSON.stringify(report, null, 2))
      return
    }

    this.log(`coursemate version: ${report.cliVersion}`)
    this.log(`node: ${report.nodeVersion}`)
    this.log(`platform: ${report.platform}`)
    this.log(`cwd: ${report.cwd}`)
    this.log(`coursemate home: ${report.home}`)
    this.log(`global env: ${report.globalEnvPath} (exists=${report.globalEnvExists})`)
    this.log(`local env: ${report.cwd}/.env (exists=${report.localEnvExists})`)
    this.log(`usage ledger: ${report.ledgerPath} (exists=${report.ledgerExists})`)
    this.log(`course data: ${report.dataPath} (exists=${report.dataExists})`)
    this.log(`provider: ${report.provider}`)
    this.log(
      `env flags: OPENAI_API_KEY=${report.env.hasOpenAIKey} OPENAI_MODEL=${report.env.hasOpenAIModel} OPENAI_BASE_URL=${report.env.hasOpenAIBaseURL}`
    )
    if (report.provider === 'openai' && !report.env.hasOpenAIKey) {
      this.warn('provider is openai but OPENAI_API_KEY is not set')
    }
  }
}
