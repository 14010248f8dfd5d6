import {Args, Command, Flags} from '@oclif/core'
import {createInterface} from 'node:readline/promises'
import {stdin as stdIn, stdout as stdOut} from 'node:process'
import type {ConversationEvent} from '../chat/events.js'
import {loadConfig} from '../config/load-config.js'
import {InMemoryEventBus} from '../core/event-bus.js'
import {createConversation, runToolLoop} from '../core/session.js'
import {SessionLogSubscriber} from '../core/subscribers/session-log-subscriber.js'
import {eventLine, red, redBold} from '../cli/output.js'

export default class Run extends Command {
  static override description = 'Send one prompt and print the reply, resolving tool calls along the way'

  static override flags = {
    quiet: Flags.boolean({description: 'print only the final reply'}),
    stream: Flags.boolean({description: 'print reply tokens as they arrive', default: false}),
    nonInteractive: Flags.boolean({description: 'deny shell commands instead of asking'})
  }

  static override args = {
    prompt: Args.string({description: 'prompt to send', required: true})
  }

  public async run(): Promise<void> {
    const {args, flags} = await this.parse(Run)
    const config = await loadConfig()
    const bus = new InMemoryEventBus<ConversationEvent>()
    const sessionLog = new SessionLogSubscriber(config.homeDir)

    const unsubscribeLog = config.runtime.sessionLog
      ? bus.subscribe((event) => sessionLog.handle(event))
      : () => {}
    const unsubscribe = flags.quiet
      ? () => {}
      : bus.subscribe((event) => {
          const line = eventLine(event)
          if (line) this.log(line)
        })

    let toolCalls = 0
    const unsubscribeTools = bus.on('tool_calls', (event) => {
      toolCalls += event.calls.length
    })

    const conversation = createConversation(config, {bus})
    conversation.appendUserInput(args.prompt)

    try {
      const result = await runToolLoop(conversation, {
        workspace: config.workspace,
        maxToolRounds: config.runtime.maxToolRounds,
        hooks: flags.stream
          ? {
              onToken: (text) => {
                stdOut.write(text)
              }
            }
          : {},
        approveShell: async (command) => {
          if (flags.nonInteractive || !stdIn.isTTY) {
            this.log(red(`shell denied (non-interactive): ${command}`))
            return false
          }

          const rl = createInterface({input: stdIn, output: stdOut})
          try {
            const answer = (await rl.question(redBold(`Allow shell command "${command}"? [y/N] `))).trim().toLowerCase()
            return answer === 'y' || answer === 'yes'
          } finally {
            rl.close()
          }
        }
      })

      if (flags.stream) stdOut.write('\n')
      else this.log(result.text)
      if (result.exhausted) this.log(red(`stopped after ${result.rounds} tool rounds`))
      if (!flags.quiet && toolCalls > 0) this.log(`tool calls: ${toolCalls} over ${result.rounds} rounds`)
    } finally {
      unsubscribeTools()
      unsubscribe()
      unsubscribeLog()
      await sessionLog.flush()
    }
  }
}
