import { parseArgs } from 'node:util'
import { BASE_CONFIG, type RunConfig } from '../conf/run-config'

type KeysOfType<T> = { [K in keyof RunConfig]: RunConfig[K] extends T ? K : never }[keyof RunConfig]

const isConfigKey = (key: string): key is keyof RunConfig => key in BASE_CONFIG
const isNumericKey = (key: keyof RunConfig): key is KeysOfType<number> => typeof BASE_CONFIG[key] === 'number'
const isStringKey = (key: keyof RunConfig): key is KeysOfType<string> => typeof BASE_CONFIG[key] === 'string'

const setTypeThenCast = (config: RunConfig, keyString: string, value: string | boolean): RunConfig => {
  const key = keyString.toUpperCase()
  if (!isConfigKey(key)) throw new Error('Invalid command line argument: ' + key)
  if (isNumericKey(key)) config[key] = Number(value)
  else if (isStringKey(key)) config[key] = String(value)
  else throw new Error('Invalid command line argument type: ' + keyString + typeof value)
  return config
}

/**
 *  Get command line arguments to override configurations, the first
 *  positional argument (if any) is the subcommand.
 */
export function getCliArgs(args: string[] = process.argv.slice(2), baseConfig: RunConfig = BASE_CONFIG): RunConfig {
  /**
   *  Allow overriding specific options via the cli.
   */
  const options = Object.keys(baseConfig).reduce<Record<string, { type: 'string'; short?: string }>>(
    (params, name) => ({ ...params, [name.toLowerCase()]: { type: 'string' } }),
    {}
  )

  const { values, positionals } = parseArgs({
    args,
    options: {
      ...options,
      solver: { type: 'string', short: 's' },
      message: { type: 'string', short: 'm' },
    },
    strict: true,
    allowPositionals: true,
  })

  const config = Object.entries(values).reduce<RunConfig>((output, [key, value]) => {
    if (value === undefined || Array.isArray(value)) return output
    return setTypeThenCast(output, key, value)
  }, { ...baseConfig })

  const [command] = positionals
  return command ? { ...config, COMMAND: command } : config
}
