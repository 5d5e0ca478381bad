import pc from 'picocolors'

type Level = 'info' | 'success' | 'warn' | 'error' | 'debug'

const LABELS: Record<Level, string> = {
  info: pc.blue('info'),
  success: pc.green('success'),
  warn: pc.yellow('warn'),
  error: pc.red('error'),
  debug: pc.magenta('debug')
}

// stdout stays reserved for data when a command prints JSON
let infoStream: NodeJS.WriteStream = process.stdout

function write(level: Level, message: string): void {
  const stream =
    level === 'warn' || level === 'error' ? process.stderr : infoStream
  stream.write(`${LABELS[level]} ${message}\n`)
}

export const logger = {
  info: (message: string) => write('info', message),
  success: (message: string) => write('success', message),
  warn: (message: string) => write('warn', message),
  error: (message: string) => write('error', message),
  debug: (message: string) => {
    if (process.env.DEBUG) {
      write('debug', message)
    }
  },
  useStderr: () => {
    infoStream = process.stderr
  }
}
