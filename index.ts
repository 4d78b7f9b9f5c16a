#!/usr/bin/env -S npx tsx
import { getCliArgs } from './src/cli/get-cli-args'
import { validateRunConfig, type Command, type ValidRunConfig } from './src/conf/run-config'
import {
  evalCommand,
  fetchCommand,
  runCommand,
  solversCommand,
  trainCommand,
  validateCommand,
  type CommandResult,
} from './src/cli/commands'

const COMMANDS: Record<Command, (config: ValidRunConfig) => CommandResult> = {
  run: runCommand,
  train: trainCommand,
  eval: evalCommand,
  validate: validateCommand,
  fetch: fetchCommand,
  solvers: solversCommand,
}

/**
 *  Parse the command line, validate the merged settings and dispatch
 *  to the subcommand, e.g. `tsx index.ts run --solver entropy --sample 200`.
 */
const main = async (): Promise<number> => {
  const config = validateRunConfig(getCliArgs())
  console.log('[cli] settings:', config)
  return COMMANDS[config.COMMAND](config)
}

await main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((e: unknown) => {
    console.warn(e)
    process.exitCode = 1
  })
