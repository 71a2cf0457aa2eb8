import {cp, mkdir, writeFile} from 'node:fs/promises'
import {dirname, isAbsolute, join, relative, resolve} from 'node:path'
import {ValidationError} from '../errors.js'
import type {Lock} from '../types.js'
import {generateScript} from './script-generator.js'

export type BuildContextOptions = {
  /** Directory direct-step dependencies are read from. */
  contextDir: string;
  outDir: string;
}

export type BuildContext = {
  dockerfile: string;
  dependencies: string[];
}

/**
 * Writes `<outDir>/Dockerfile` and copies every direct-step dependency beside
 * it, keeping relative paths, so that `outDir` is a complete build context.
 */
export async function writeBuildContext(lock: Lock, options: BuildContextOptions): Promise<BuildContext> {
  const contextDir = resolve(options.contextDir)
  const outDir = resolve(options.outDir)
  const {script, dependencies} = await generateScript(lock, {contextDir})

  const copies = dependencies.map(dependency => {
    const source = resolve(contextDir, dependency)
    const inside = relative(contextDir, source)
    if (inside.length === 0 || inside.startsWith('..') || isAbsolute(inside)) {
      throw new ValidationError(`Dependency "${dependency}" is outside the build context ${contextDir}`)
    }

    return {source, destination: join(outDir, inside)}
  })

  await mkdir(outDir, {recursive: true})
  for (const {source, destination} of copies) {
    // Writing into the context directory itself leaves dependencies in place
    if (source === destination) {
      continue
    }

    await mkdir(dirname(destination), {recursive: true})
    await cp(source, destination, {recursive: true})
  }

  const dockerfile = join(outDir, 'Dockerfile')
  await writeFile(dockerfile, script, 'utf8')
  return {dockerfile, dependencies}
}
