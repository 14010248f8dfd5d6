import {z} from 'zod'
import {FunctionArguments} from '../chat/function-arguments.js'
import type {FunctionCall, FunctionCallHandler, FunctionResult, ToolDefinition} from '../chat/types.js'
import {errorMessage} from '../core/errors.js'
import {listFiles, readTextFile} from './filesystem.js'
import {runShell} from './shell.js'

export type ToolHandlerOptions = {
  workspace: string
  /** Asked before every shell command; missing means shell is disabled. */
  approveShell?: (command: string) => Promise<boolean> | boolean
  shellTimeoutMs?: number
}

export const builtinTools: ToolDefinition[] = [
  {
    name: 'read_file',
    description: 'Read a UTF-8 text file inside the workspace.',
    inputSchema: {
      type: 'object',
      properties: {path: {type: 'string', description: 'Path relative to the workspace root.'}},
      required: ['path']
    }
  },
  {
    name: 'list_files',
    description: 'List the entries of a workspace directory. Directories end with "/".',
    inputSchema: {
      type: 'object',
      properties: {path: {type: 'string', description: 'Directory relative to the workspace root. Defaults to ".".'}}
    }
  },
  {
    name: 'run_shell',
    description: 'Run a shell command in the workspace and return its exit code and output.',
    inputSchema: {
      type: 'object',
      properties: {command: {type: 'string'}},
      required: ['command']
    }
  }
]

function failure(message: string): FunctionResult {
  return {content: message, invocationSucceeded: false}
}

async function invoke(call: FunctionCall, options: ToolHandlerOptions): Promise<FunctionResult> {
  const args = new FunctionArguments(call.arguments)

  switch (call.name) {
    case 'read_file': {
      const path = args.get('path', z.string().min(1), '')
      if (path.error) return failure(`read_file rejected: ${path.error.message}`)
      return {content: await readTextFile(options.workspace, path.value), invocationSucceeded: true}
    }

    case 'list_files': {
      // a missing path just means the workspace root
      const path = args.get('path', z.string().min(1), '.')
      const entries = await listFiles(options.workspace, path.value)
      return {content: entries.join('\n') || '(empty directory)', invocationSucceeded: true}
    }

    case 'run_shell': {
      const command = args.get('command', z.string().min(1), '')
      if (command.error) return failure(`run_shell rejected: ${command.error.message}`)
      const approved = (await options.approveShell?.(command.value)) ?? false
      if (!approved) return failure(`run_shell rejected: command not approved. command=${command.value}`)
      const {exitCode, output} = await runShell(command.value, options.workspace, options.shellTimeoutMs)
      return {content: output, invocationSucceeded: exitCode === 0}
    }

    default:
      return failure(`Unknown tool: ${call.name}`)
  }
}

/**
 * Batch handler for the built-in tools. Each call is isolated: a failing
 * tool produces an unsuccessful result instead of failing the batch.
 */
export function createToolHandler(options: ToolHandlerOptions): FunctionCallHandler {
  return async (calls) => {
    const results: FunctionResult[] = []
    for (const call of calls) {
      try {
        results.push(await invoke(call, options))
      } catch (error) {
        results.push(failure(errorMessage(error)))
      }
    }
    return results
  }
}
