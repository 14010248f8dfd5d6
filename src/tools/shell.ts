import {execa} from 'execa'

function resolveShell(): string | true {
  if (process.env.SHELL?.trim()) return process.env.SHELL
  if (process.platform === 'win32') return process.env.ComSpec || 'cmd.exe'
  return true
}

export type ShellOutput = {
  exitCode: number | undefined
  output: string
}

export async function runShell(command: string, cwd = process.cwd(), timeoutMs = 60_000): Promise<ShellOutput> {
  const {stdout, stderr, exitCode, timedOut} = await execa(command, {
    cwd,
    reject: false,
    shell: resolveShell(),
    timeout: timeoutMs
  })
  const header = timedOut ? `exit_code=${exitCode} timed_out=true` : `exit_code=${exitCode}`
  if (!stdout && !stderr) return {exitCode, output: `${header}\n(no output)`}
  return {exitCode, output: [header, stdout, stderr].filter(Boolean).join('\n')}
}
