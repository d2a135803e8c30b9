import chalk from 'chalk'

export type Logger = {
  debug: (message: string) => void
  info: (message: string) => void
  warn: (message: string) => void
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
}

/**
 * Console logger in the same glyph style as the CLI formatter.
 * Debug lines are dropped unless `verbose` is set.
 */
export function createConsoleLogger(options?: { verbose?: boolean }): Logger {
  const verbose = options?.verbose ?? false
  return {
    debug: (message) => {
      if (!verbose) return
      console.log(chalk.dim(`· ${message}`))
    },
    info: (message) => {
      console.log(chalk.cyan(`ℹ ${message}`))
    },
    warn: (message) => {
      console.log(chalk.yellow(`⚠ ${message}`))
    },
  }
}
