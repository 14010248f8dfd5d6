import {readFile, readdir} from 'node:fs/promises'
import {resolve, sep} from 'node:path'

const MAX_READ_CHARS = 20_000

export function resolveWorkspacePath(workspace: string, inputPath: string): string {
  const workspaceRoot = resolve(workspace)
  const fullPath = resolve(workspaceRoot, inputPath)
  const inWorkspace = fullPath === workspaceRoot || fullPath.startsWith(`${workspaceRoot}${sep}`)
  if (!inWorkspace) {
    throw new Error(`Path '${inputPath}' is outside workspace.`)
  }

  return fullPath
}

export async function readTextFile(workspace: string, path: string): Promise<string> {
  const content = await readFile(resolveWorkspacePath(workspace, path), 'utf8')
  if (content.length <= MAX_READ_CHARS) return content
  return `${content.slice(0, MAX_READ_CHARS)}\n...[truncated]`
}

export async function listFiles(workspace: string, path = '.'): Promise<string[]> {
  const entries = await readdir(resolveWorkspacePath(workspace, path), {withFileTypes: true})
  return entries
    .map((entry) => (entry.isDirectory() ? `${entry.name}/` : entry.name))
    .sort((a, b) => a.localeCompare(b))
}
