import {Command, Flags} from '@oclif/core'
import {createInterface} from 'node:readline/promises'
import {stdin as stdIn, stdout as stdOut} from 'node:process'
import {loadConfig} from '../config/load-config.js'
import {cyan, red, shorten} from '../cli/event-lines.js'
import {wireEvents} from '../cli/wiring.js'
import type {CourseAssistant} from '../core/assistant.js'
import {errorMessage} from '../core/errors.js'
import {createCourseAssistant} from '../core/runtime.js'
import {describeTurn} from '../core/turns.js'
import {summarizeUsage} from '../core/usage-ledger.js'

const CHAT_COMMANDS = ['/help', '/exit', '/quit', '/clear', '/history', '/session', '/tools', '/usage']

function printHelp(log: (line: string) => void): void {
  log(cyan('chat commands:'))
  log(cyan('  /help                    show this help'))
  log(cyan('  /exit or /quit           exit chat'))
  log(cyan('  /clear                   end this conversation and start a new one'))
  log(cyan('  /history [n]             show the last n turns (default 20)'))
  log(cyan('  /session                 show current session id and turn count'))
  log(cyan('  /tools                   list the tools the assistant can call'))
  log(cyan('  /usage                   show token usage and cost of this session'))
  log(cyan('  Ctrl-C                   cancel the question in progress'))
}

function createCompleter() {
  return (line: string): [string[], string] => {
    if (!line.startsWith('/')) return [[], line]
    const hits = CHAT_COMMANDS.filter((command) => command.startsWith(line))
    return [hits.length > 0 ? hits : CHAT_COMMANDS, line]
  }
}

function countArgument(input: string, fallback: number): number {
  const maybeCount = Number.parseInt(input.split(/\s+/)[1] ?? String(fallback), 10)
  return Number.isFinite(maybeCount) && maybeCount > 0 ? maybeCount : fallback
}

export default class Chat extends Command {
  static override description = 'Interactive chat about your coursework'

  static override flags = {
    quiet: Flags.boolean({description: 'hide execution logs and show only assistant responses'}),
    debug: Flags.boolean({description: 'show every loop event with timing info'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Chat)
    const config = await loadConfig().catch((error: unknown) => this.error(errorMessage(error)))
    const wiring = wireEvents(config, flags, (line) => this.log(line))

    let assistant: CourseAssistant
    try {
      assistant = createCourseAssistant(config, {bus: wiring.bus})
    } catch (error) {
      await wiring.close()
      this.error(errorMessage(error))
    }

    const rl = createInterface({input: stdIn, output: stdOut, completer: createCompleter()})
    let inFlight: AbortController | undefined
    rl.on('SIGINT', () => {
      if (inFlight) {
        this.log(cyan('\ncancelling...'))
        inFlight.abort()
        return
      }
      this.log(cyan('\nType /exit to quit.'))
    })

    let sessionId = assistant.openSession()
    try {
      this.log(cyan('coursemate chat started. Type /help for commands.'))

      while (true) {
        let input = ''
        try {
          input = (await rl.question(cyan('you> '))).trim()
        } catch (error) {
          this.log(red(`input closed: ${errorMessage(error)}`))
          break
        }

        if (!input) continue
        if (input === '/exit' || input === '/quit') break

        if (input === '/help') {
          printHelp((line) => this.log(line))
          continue
        }

        if (input === '/clear') {
          assistant.endSession(sessionId)
          sessionId = assistant.openSession()
          this.log(cyan('session cleared'))
          continue
        }

        if (input.startsWith('/history')) {
          const turns = assistant.transcript(sessionId).slice(-countArgument(input, 20))
          if (turns.length === 0) {
            this.log(cyan('(history empty)'))
            continue
          }

          for (const turn of turns) {
            this.log(`${turn.kind}> ${shorten(describeTurn(turn), 300)}`)
          }
          continue
        }

        if (input === '/session') {
          this.log(cyan(`session: ${sessionId} turns: ${assistant.transcript(sessionId).length}`))
          continue
        }

        if (input === '/tools') {
          for (const tool of assistant.registry.describeAll()) {
            this.log(`${tool.name}: ${tool.description}`)
          }
          continue
        }

        if (input === '/usage') {
          try {
            const records = (await assistant.ledger.records()).filter((record) => record.sessionId === sessionId)
            const summary = summarizeUsage(records)
            this.log(
              cyan(
                `model calls: ${summary.totalQueries} tokens: ${summary.totalTokens} cost: $${summary.totalCost.toFixed(6)}`
              )
            )
          } catch (error) {
            this.log(red(`could not read usage ledger: ${errorMessage(error)}`))
          }
          continue
        }

        if (input.startsWith('/')) {
          this.log(red(`unknown command: ${input}`))
          this.log(cyan('type /help to see supported commands'))
          continue
        }

        const controller = new AbortController()
        inFlight = controller
        try {
          const outcome = await assistant.ask(sessionId, input, {signal: controller.signal})
          this.log(cyan('assistant>'))
          this.log(outcome.state === 'terminated' ? outcome.answer : red(outcome.message))
        } finally {
          inFlight = undefined
        }
      }
    } finally {
      assistant.endSession(sessionId)
      await wiring.close()
      rl.close()
    }
  }
}
