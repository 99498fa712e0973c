import {Command, Flags} from '@oclif/core'
import {mkdir, writeFile} from 'node:fs/promises'
import {resolve} from 'node:path'
import {getCourseDataPath, getCoursemateHome} from '../config/paths.js'

const EMPTY_COURSE_DATA = {
  courses: [],
  assignments: [],
  announcements: []
}

export default class Init extends Command {
  static override description = 'Initialize local project config and the global coursemate home'

  static override flags = {
    force: Flags.boolean({char: 'f', description: 'overwrite existing files'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Init)
    const flag = flags.force ? 'w' : 'wx'
    const homeDir = getCoursemateHome()
    const dataPath = getCourseDataPath(homeDir)
    const configPath = resolve(process.cwd(), '.coursematerc.json')
    const globalEnvExamplePath = resolve(homeDir, '.env.example')

    await mkdir(homeDir, {recursive: true})
    await writeFile(
      configPath,
      JSON.stringify(
        {
          provider: 'openai',
          model: '',
          baseURL: '',
          homeDir,
          runtime: {maxIterations: 8, modelTimeoutMs: 45_000, toolTimeoutMs: 30_000}
        },
        null,
        2
      ) + '\n',
      {flag}
    )

    await writeFile(globalEnvExamplePath, 'OPENAI_API_KEY=\nOPENAI_MODEL=gpt-4o-mini\nOPENAI_BASE_URL=\n', {flag})
    await writeFile(dataPath, JSON.stringify(EMPTY_COURSE_DATA, null, 2) + '\n', {flag})

    this.log(`Created ${configPath}`)
    this.log(`Created ${globalEnvExamplePath}`)
    this.log(`Created ${dataPath}`)
  }
}
