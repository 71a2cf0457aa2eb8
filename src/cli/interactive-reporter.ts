import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import {type Reporter, type ResolutionEvent, describeSubject} from '../core/reporter.js'
import {formatDuration} from '../core/utils.js'

/**
 * Reporter with interactive terminal UI using a spinner and colors.
 * Resolved placeholders are printed above the spinner as they complete.
 * Suitable for local development and manual execution.
 */
export class InteractiveReporter implements Reporter {
  private spinner?: Ora
  private total = 0
  private done = 0

  emit(event: ResolutionEvent): void {
    switch (event.event) {
      case 'RESOLUTION_START': {
        console.error(chalk.bold(`\n▶ Resolving ${chalk.cyan(String(event.bases))} bases and ${chalk.cyan(String(event.features))} features\n`))
        this.spinner = ora({text: 'Resolving versions', prefixText: ' '}).start()
        break
      }

      case 'VERSION_RESOLVING': {
        this.total++
        this.updateProgress()
        break
      }

      case 'VERSION_RESOLVED': {
        this.done++
        this.print(`  ${chalk.green('✓')} ${describeSubject(event.subject)} ${chalk.gray('→')} ${chalk.cyan(event.version)} ${chalk.gray(`(${formatDuration(event.durationMs)})`)}`)
        this.updateProgress()
        break
      }

      case 'VERSION_RETRYING': {
        this.print(`  ${chalk.yellow('↻')} ${chalk.yellow(`${describeSubject(event.subject)} (retry ${event.attempt}/${event.maxRetries}): ${event.reason}`)}`)
        break
      }

      case 'DIGEST_MISSING': {
        this.print(`  ${chalk.yellow('!')} ${chalk.yellow(`${event.image} has no digest, locked by tag`)}`)
        break
      }

      case 'RESOLUTION_FINISHED': {
        this.spinner?.stop()
        console.error(chalk.bold.green(`\n✓ Locked ${event.builds} builds (${formatDuration(event.durationMs)})\n`))
        break
      }

      case 'RESOLUTION_FAILED': {
        this.spinner?.stop()
        console.error(chalk.bold.red(`\n✗ Resolution failed${event.subject ? ` at ${describeSubject(event.subject)}` : ''} [${event.code}]\n`))
        break
      }
    }
  }

  private updateProgress(): void {
    if (this.spinner) {
      this.spinner.text = `Resolving versions (${this.done}/${this.total})`
    }
  }

  private print(line: string): void {
    if (this.spinner) {
      this.spinner.clear()
      console.error(line)
      this.spinner.render()
    } else {
      console.error(line)
    }
  }
}
