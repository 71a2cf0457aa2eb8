/**
 * Output of a command run inside a container.
 */
export type ExecResult = {
  /** Exit code (0 = success, non-zero = failure) */
  exitCode: number;
  /** Stdout, split into lines */
  stdout: string[];
  /** Stderr, split into lines */
  stderr: string[];
}

/**
 * Options shared by executor calls.
 */
export type ExecOptions = {
  /** Aborts the call (and removes the container) when signalled */
  signal?: AbortSignal;
  /** Deadline in seconds (undefined = no timeout) */
  timeoutSec?: number;
}

/**
 * Abstract interface for running version commands and inspecting images.
 *
 * Implementations:
 * - `DockerCliExecutor`: Uses Docker CLI
 * - Tests use an in-process fake
 *
 * The executor is responsible for:
 * - Pulling the image before use
 * - Running a command in a fresh, throwaway container
 * - Looking up the registry digest of an image
 */
export abstract class ContainerExecutor {
  /**
   * Verifies that the executor is available and functional.
   * @throws If the executor is not installed or not accessible
   */
  abstract check(): Promise<void>

  /**
   * Runs `command` in a fresh container created from `image`.
   * The first element of `command` replaces the image's entrypoint.
   */
  abstract exec(image: string, command: string[], options?: ExecOptions): Promise<ExecResult>

  /**
   * Returns the content-addressed digest (e.g. `sha256:…`) of `image`.
   * @throws DigestNotFoundError when the registry reports none
   */
  abstract digest(image: string, options?: ExecOptions): Promise<string>
}
