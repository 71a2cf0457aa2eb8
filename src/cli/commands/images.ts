import {resolve} from 'node:path'
import type {Command} from 'commander'
import {listImages, readLock} from '../../core/lock-file.js'
import {getGlobalOptions} from '../utils.js'

export function registerImagesCommand(program: Command): void {
  program
    .command('images')
    .description('List the images of the lock (target, image name and tag)')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {lock: lockPath, json} = getGlobalOptions(cmd)
      const images = listImages(await readLock(resolve(lockPath)))
      console.log(json ? JSON.stringify(images) : `images=${JSON.stringify(images)}`)
    })
}
