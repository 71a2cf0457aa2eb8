#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command, Option} from 'commander'
import {ImagewrightError} from '../errors.js'
import {registerImagesCommand} from './commands/images.js'
import {registerUpdateCommand} from './commands/update.js'
import {registerWriteCommand} from './commands/write.js'
import {logLevels} from './utils.js'

async function main() {
  const program = new Command()

  program
    .name('imagewright')
    .description('Resolve a family of container images into a lock and a multi-stage Dockerfile')
    .version('0.1.0')
    .option('--config <path>', 'Config file (TOML, YAML or JSON)', process.env.IMAGEWRIGHT_CONFIG ?? 'imagewright.toml')
    .option('--lock <path>', 'Lock file', process.env.IMAGEWRIGHT_LOCK ?? 'imagewright.lock')
    .option('--json', 'Output structured JSON')
    .addOption(new Option('--log-level <level>', 'Level of JSON logs').choices(logLevels).default('info'))

  registerUpdateCommand(program)
  registerWriteCommand(program)
  registerImagesCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  const code = error instanceof ImagewrightError ? chalk.gray(` [${error.code}]`) : ''
  console.error(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`) + code)
  process.exitCode = 1
}
