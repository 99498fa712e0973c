import {homedir} from 'node:os'
import {resolve} from 'node:path'

export function getCoursemateHome(): string {
  const custom = process.env.COURSEMATE_HOME?.trim()
  if (custom) return resolve(custom)
  return resolve(homedir(), '.coursemate')
}

export function getGlobalEnvPath(homeDir = getCoursemateHome()): string {
  return resolve(homeDir, '.env')
}

export function getUsageLedgerPath(homeDir = getCoursemateHome()): string {
  return resolve(homeDir, 'usage.jsonl')
}

export function getCourseDataPath(homeDir = getCoursemateHome()): string {
  return resolve(homeDir, 'courses.json')
}

export function getSessionsDir(homeDir = getCoursemateHome()): string {
  return resolve(homeDir, 'sessions')
}

export function getSessionLogPath(sessionId: string, homeDir = getCoursemateHome()): string {
  return resolve(getSessionsDir(homeDir), `${sessionId}.jsonl`)
}
