import {Command, Flags} from '@oclif/core'
import {createInterface} from 'node:readline/promises'
import {stdin as stdIn, stdout as stdOut} from 'node:process'
import type {Conversation} from '../chat/conversation.js'
import type {ConversationEvent} from '../chat/events.js'
import {messageText} from '../chat/message.js'
import {loadConfig} from '../config/load-config.js'
import {errorMessage, TransportError} from '../core/errors.js'
import {InMemoryEventBus} from '../core/event-bus.js'
import {createConversation, runToolLoop} from '../core/session.js'
import {SessionLogSubscriber} from '../core/subscribers/session-log-subscriber.js'
import {cyan, eventLine, red, redBold, shorten} from '../cli/output.js'

const CHAT_COMMANDS = ['/help', '/exit', '/quit', '/clear', '/history', '/config', '/session']

function printHelp(log: (line: string) => void): void {
  log(cyan('chat commands:'))
  log(cyan('  /help              show this help'))
  log(cyan('  /exit or /quit     exit chat'))
  log(cyan('  /clear             start a new conversation'))
  log(cyan('  /history [n]       show recent non-system messages (default 20)'))
  log(cyan('  /config            print resolved config'))
  log(cyan('  /session           show conversation id and message count'))
}

function createCompleter() {
  return (line: string): [string[], string] => {
    if (!line.startsWith('/')) return [[], line]
    const hits = CHAT_COMMANDS.filter((command) => command.startsWith(line))
    return [hits.length > 0 ? hits : CHAT_COMMANDS, line]
  }
}

export default class Chat extends Command {
  static override description = 'Interactive chat that streams replies and runs built-in tools'

  static override flags = {
    verbose: Flags.boolean({description: 'show turn, usage and tool events'}),
    nonInteractive: Flags.boolean({description: 'deny shell commands instead of asking'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Chat)
    const config = await loadConfig()
    const rl = createInterface({input: stdIn, output: stdOut, completer: createCompleter()})
    const bus = new InMemoryEventBus<ConversationEvent>()
    const sessionLog = new SessionLogSubscriber(config.homeDir)

    const unsubscribeLog = config.runtime.sessionLog
      ? bus.subscribe((event) => sessionLog.handle(event))
      : () => {}
    const unsubscribe = flags.verbose
      ? bus.subscribe((event) => {
          const line = eventLine(event)
          if (line) this.log(line)
        })
      : () => {}

    let conversation: Conversation = createConversation(config, {bus})
    this.log(cyan(`chatweave chat started (${config.provider}). Type /help for commands.`))

    try {
      while (true) {
        let input = ''
        try {
          input = (await rl.question(cyan('you> '))).trim()
        } catch (error) {
          // readline rejects once stdin closes
          this.log(cyan(`\ninput closed: ${errorMessage(error)}`))
          break
        }

        if (!input) continue
        if (input === '/exit' || input === '/quit') break

        if (input === '/help') {
          printHelp((line) => this.log(line))
          continue
        }

        if (input === '/clear') {
          conversation = createConversation(config, {bus})
          this.log(cyan(`new conversation: ${conversation.id}`))
          continue
        }

        if (input.startsWith('/history')) {
          const maybeCount = Number.parseInt(input.split(/\s+/)[1] ?? '20', 10)
          const count = Number.isFinite(maybeCount) && maybeCount > 0 ? maybeCount : 20
          const messages = conversation.messages.filter((message) => message.role !== 'system').slice(-count)
          if (messages.length === 0) {
            this.log(cyan('(history empty)'))
            continue
          }

          for (const message of messages) {
            this.log(`${message.role}> ${shorten(messageText(message), 300)}`)
          }
          continue
        }

        if (input === '/config') {
          this.log(JSON.stringify(config, null, 2))
          continue
        }

        if (input === '/session') {
          const nonSystem = conversation.messages.filter((message) => message.role !== 'system').length
          this.log(cyan(`conversation: ${conversation.id} messages(non-system): ${nonSystem}`))
          continue
        }

        if (input.startsWith('/')) {
          this.log(red(`unknown command: ${input}`))
          this.log(cyan('type /help to see supported commands'))
          continue
        }

        conversation.appendUserInput(input)
        stdOut.write(cyan('assistant> '))
        try {
          const result = await runToolLoop(conversation, {
            workspace: config.workspace,
            maxToolRounds: config.runtime.maxToolRounds,
            hooks: {
              onToken: (text) => {
                stdOut.write(text)
              }
            },
            approveShell: async (command) => {
              if (flags.nonInteractive || !stdIn.isTTY) {
                this.log(red(`\nshell denied (non-interactive): ${command}`))
                return false
              }

              const answer = (await rl.question(redBold(`\nAllow shell command "${command}"? [y/N] `)))
                .trim()
                .toLowerCase()
              return answer === 'y' || answer === 'yes'
            }
          })
          stdOut.write('\n')
          if (result.exhausted) this.log(red(`stopped after ${result.rounds} tool rounds`))
        } catch (error) {
          // a failed request leaves the conversation usable; anything else is a bug
          if (!(error instanceof TransportError)) throw error
          this.log(red(`\nrequest failed${error.status ? ` (${error.status})` : ''}: ${error.message}`))
        }
      }
    } finally {
      unsubscribe()
      unsubscribeLog()
      await sessionLog.flush()
      rl.close()
    }
  }
}
