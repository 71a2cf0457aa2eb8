import process from 'node:process'
import {dirname, relative, resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {writeBuildContext} from '../../core/build-context.js'
import {readLock} from '../../core/lock-file.js'
import {getGlobalOptions} from '../utils.js'

export function registerWriteCommand(program: Command): void {
  program
    .command('write')
    .description('Render the lock into a Dockerfile and its build context')
    .option('-o, --out <dir>', 'Output directory', 'build')
    .action(async (options: {out: string}, cmd: Command) => {
      const {config, lock: lockPath, json} = getGlobalOptions(cmd)
      const lock = await readLock(resolve(lockPath))
      const {dockerfile, dependencies} = await writeBuildContext(lock, {
        contextDir: dirname(resolve(config)),
        outDir: options.out
      })

      if (json) {
        console.log(JSON.stringify({dockerfile, dependencies}))
        return
      }

      console.log(chalk.green(`Wrote ${relative(process.cwd(), dockerfile)} (${lock.builds.length} targets, ${dependencies.length} dependencies)`))
    })
}
