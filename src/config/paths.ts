import {homedir} from 'node:os'
import {resolve} from 'node:path'

export function getChatweaveHome(): string {
  const custom = process.env.CHATWEAVE_HOME?.trim()
  if (custom) return resolve(custom)
  return resolve(homedir(), '.chatweave')
}

export function getGlobalEnvPath(): string {
  return resolve(getChatweaveHome(), '.env')
}

export function getSessionsDir(homeDir = getChatweaveHome()): string {
  return resolve(homeDir, 'sessions')
}

export function getSessionLogPath(sessionId: string, homeDir = getChatweaveHome()): string {
  return resolve(getSessionsDir(homeDir), `${sessionId}.jsonl`)
}
