import {Args, Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'
import {cyan, red} from '../cli/event-lines.js'
import {wireEvents} from '../cli/wiring.js'
import type {CourseAssistant} from '../core/assistant.js'
import {errorMessage} from '../core/errors.js'
import {createCourseAssistant} from '../core/runtime.js'

export default class Ask extends Command {
  static override description = 'Ask one question about your coursework'

  static override examples = ['<%= config.bin %> ask "What is due this week?"']

  static override flags = {
    quiet: Flags.boolean({description: 'hide execution logs and print only the answer'}),
    debug: Flags.boolean({description: 'show every loop event with timing info'})
  }

  static override args = {
    question: Args.string({description: 'question to ask', required: true})
  }

  public async run(): Promise<void> {
    const {args, flags} = await this.parse(Ask)
    const config = await loadConfig().catch((error: unknown) => this.error(errorMessage(error)))
    const wiring = wireEvents(config, flags, (line) => this.log(line))

    let assistant: CourseAssistant
    try {
      assistant = createCourseAssistant(config, {bus: wiring.bus})
    } catch (error) {
      await wiring.close()
      this.error(errorMessage(error))
    }

    const controller = new AbortController()
    const onInterrupt = () => {
      this.log(cyan('cancelling...'))
      controller.abort()
    }
    process.once('SIGINT', onInterrupt)

    const sessionId = assistant.openSession()
    try {
      const outcome = await assistant.ask(sessionId, args.question, {signal: controller.signal})
      if (outcome.state === 'failed') {
        this.logToStderr(red(outcome.message))
        process.exitCode = 1
        return
      }

      this.log(outcome.answer)
    } finally {
      process.off('SIGINT', onInterrupt)
      assistant.endSession(sessionId)
      await wiring.close()
    }
  }
}
