import process from 'node:process'
import {randomUUID} from 'node:crypto'
import {execa} from 'execa'
import {DigestNotFoundError, DockerError, DockerNotAvailableError, ImagePullError} from '../errors.js'
import {ContainerExecutor, type ExecOptions, type ExecResult} from './executor.js'
import {imageRepository} from './image-ref.js'

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept; everything else is stripped
 * so that host secrets (API tokens, credentials) never reach the CLI.
 */
function dockerCliEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  return env
}

function splitLines(output: string): string[] {
  return output.split(/\r?\n/)
}

function parseRepoDigests(output: string): string[] {
  const parsed: unknown = JSON.parse(output.trim() || 'null')
  if (!Array.isArray(parsed)) {
    return []
  }

  return parsed.filter((entry): entry is string => typeof entry === 'string')
}

export class DockerCliExecutor extends ContainerExecutor {
  private readonly env = dockerCliEnv()

  async check(): Promise<void> {
    try {
      await execa('docker', ['--version'], {env: this.env, extendEnv: false})
    } catch (error) {
      throw new DockerNotAvailableError({cause: error})
    }
  }

  async exec(image: string, command: string[], options?: ExecOptions): Promise<ExecResult> {
    const [entrypoint, ...args] = command
    if (!entrypoint) {
      throw new DockerError('EMPTY_COMMAND', `No command given to run in "${image}"`)
    }

    await this.pull(image, options)

    const name = `imagewright-${randomUUID()}`
    try {
      const result = await execa('docker', ['run', '--rm', '--name', name, '--entrypoint', entrypoint, image, ...args], {
        env: this.env,
        extendEnv: false,
        reject: false,
        cancelSignal: options?.signal,
        timeout: options?.timeoutSec ? options.timeoutSec * 1000 : undefined
      })

      if (result.isCanceled || result.timedOut) {
        throw new DockerError(
          result.timedOut ? 'CONTAINER_TIMEOUT' : 'CONTAINER_CANCELLED',
          `Command in "${image}" ${result.timedOut ? 'timed out' : 'was cancelled'}`,
          {cause: result}
        )
      }

      return {
        exitCode: result.exitCode ?? 1,
        stdout: splitLines(result.stdout),
        stderr: splitLines(result.stderr)
      }
    } finally {
      // --rm does not cover a CLI client killed by a timeout or an abort
      await execa('docker', ['rm', '-f', '-v', name], {env: this.env, extendEnv: false, reject: false})
    }
  }

  async digest(image: string, options?: ExecOptions): Promise<string> {
    await this.pull(image, options)

    const result = await execa('docker', ['image', 'inspect', '--format', '{{json .RepoDigests}}', image], {
      env: this.env,
      extendEnv: false,
      reject: false,
      cancelSignal: options?.signal
    })
    if (result.failed) {
      throw new DigestNotFoundError(image, {cause: result})
    }

    const repository = imageRepository(image)
    const digests = parseRepoDigests(result.stdout)
    const match = digests.find(entry => entry.startsWith(`${repository}@`)) ?? digests[0]
    const digest = match?.split('@')[1]
    if (!digest) {
      throw new DigestNotFoundError(image)
    }

    return digest
  }

  private async pull(image: string, options?: ExecOptions): Promise<void> {
    try {
      await execa('docker', ['pull', '--quiet', image], {
        env: this.env,
        extendEnv: false,
        cancelSignal: options?.signal,
        timeout: options?.timeoutSec ? options.timeoutSec * 1000 : undefined
      })
    } catch (error) {
      throw new ImagePullError(image, {cause: error})
    }
  }
}
