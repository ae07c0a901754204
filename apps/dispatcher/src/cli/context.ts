export interface CliIO {
  out: (line: string) => void
  err: (line: string) => void
}

export interface CliContext {
  io: CliIO
  // Set by the command that ran; returned by runCli
  exitCode: number
}

export const EXIT_USAGE = 2
export const EXIT_RUNTIME_ENVIRONMENT = 3

export const defaultIO: CliIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`)
}
