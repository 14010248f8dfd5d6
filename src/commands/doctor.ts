import {Command, Flags} from '@oclif/core'
import {existsSync} from 'node:fs'
import process from 'node:process'
import {loadConfig} from '../config/load-config.js'
import {getChatweaveHome, getGlobalEnvPath, getSessionsDir} from '../config/paths.js'

type DoctorReport = {
  cliVersion: string
  nodeVersion: string
  platform: string
  cwd: string
  chatweaveHome: string
  globalEnvPath: string
  globalEnvExists: boolean
  localEnvPath: string
  localEnvExists: boolean
  sessionsDir: string
  sessionsDirExists: boolean
  env: {
    hasOpenAIKey: boolean
    hasOpenAIModel: boolean
    hasOpenAIBaseURL: boolean
    provider?: string
  }
  config: unknown
}

export default class Doctor extends Command {
  static override description = 'Print runtime diagnostics for config and environment'

  static override flags = {
    json: Flags.boolean({description: 'print JSON output'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Doctor)

    const localEnvPath = `${process.cwd()}/.env`
    const config = await loadConfig()
    const sessionsDir = getSessionsDir(config.homeDir)
    const report: DoctorReport = {
      cliVersion: this.config.pjson.version,
      nodeVersion: process.version,
      platform: `${process.platform}-${process.arch}`,
      cwd: process.cwd(),
      chatweaveHome: getChatweaveHome(),
      globalEnvPath: getGlobalEnvPath(),
      globalEnvExists: existsSync(getGlobalEnvPath()),
      localEnvPath,
      localEnvExists: existsSync(localEnvPath),
      sessionsDir,
      sessionsDirExists: existsSync(sessionsDir),
      env: {
        hasOpenAIKey: Boolean(process.env.OPENAI_API_KEY),
        hasOpenAIModel: Boolean(process.env.OPENAI_MODEL),
        hasOpenAIBaseURL: Boolean(process.env.OPENAI_BASE_URL),
        provider: process.env.CHATWEAVE_PROVIDER
      },
      config
    }

    if (flags.json) {
      this.log(JSON.stringify(report, null, 2))
      return
    }

    this.log(`chatweave version: ${report.cliVersion}`)
    this.log(`node: ${report.nodeVersion}`)
    this.log(`platform: ${report.platform}`)
    this.log(`cwd: ${report.cwd}`)
    this.log(`chatweave home: ${report.chatweaveHome}`)
    this.log(`global env: ${report.globalEnvPath} (exists=${report.globalEnvExists})`)
    this.log(`local env: ${report.localEnvPath} (exists=${report.localEnvExists})`)
    this.log(`sessions: ${report.sessionsDir} (exists=${report.sessionsDirExists})`)
    this.log(
      `env flags: OPENAI_API_KEY=${report.env.hasOpenAIKey} OPENAI_MODEL=${report.env.hasOpenAIModel} OPENAI_BASE_URL=${report.env.hasOpenAIBaseURL} CHATWEAVE_PROVIDER=${report.env.provider ?? '-'}`
    )
    if (config.provider === 'openai' && !report.env.hasOpenAIKey) {
      this.warn('provider is openai but OPENAI_API_KEY is not set')
    }
    this.log('resolved config:')
    this.log(JSON.stringify(report.config, null, 2))
  }
}
