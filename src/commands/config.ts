import {Command, Flags} from '@oclif/core'
import {loadConfig} from '../config/load-config.js'

function flatten(value: unknown, prefix = ''): Array<[string, string]> {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.entries(value).flatMap(([key, nested]) => flatten(nested, prefix ? `${prefix}.${key}` : key))
  }
  return [[prefix, Array.isArray(value) ? value.join(',') : String(value ?? '')]]
}

export default class Config extends Command {
  static override description = 'Print the resolved configuration after env and config file overlays'

  static override flags = {
    json: Flags.boolean({description: 'print JSON instead of key=value lines'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Config)
    const config = await loadConfig()
    if (flags.json) {
      this.log(JSON.stringify(config, null, 2))
      return
    }

    for (const [key, value] of flatten(config)) this.log(`${key}=${value}`)
  }
}
