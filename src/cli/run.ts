// Command-line driver: run one file, or an interactive prompt where every line
// is an independent scan/parse cycle.

import { readFile } from 'fs/promises'
import { createInterface } from 'readline'
import { parseExpression, render } from '../index'
import { formatToken } from '../lexer/token'
import { formatParseError, formatScanError } from '../diagnostics'
import { Result, ok, err } from '../result'
import { Logger, LogSink, consoleSink, levelFromEnv } from './logger'

// sysexits.h codes
export const EXIT_OK = 0
export const EXIT_USAGE = 64
export const EXIT_DATAERR = 65
export const EXIT_NOINPUT = 66

export const USAGE = 'Usage: kestrel [--tokens] [--json] [--verbose] [file]'

export interface RunOptions {
  // Print the token list before the tree.
  tokens?: boolean
  // Print the tree as JSON instead of the debug rendering.
  json?: boolean
}

export interface CliArgs {
  file?: string
  verbose: boolean
  options: RunOptions
}

export function parseArgs(argv: readonly string[]): Result<CliArgs, string> {
  const args: CliArgs = { verbose: false, options: {} }
  for (const arg of argv) {
    switch (arg) {
      case '--tokens':
        args.options.tokens = true
        break
      case '--json':
        args.options.json = true
        break
      case '--verbose':
        args.verbose = true
        break
      default:
        if (arg.startsWith('-')) return err(`unknown option '${arg}'`)
        if (args.file !== undefined) return err('expected at most one file')
        args.file = arg
    }
  }
  return ok(args)
}

/**
 * One scan/parse cycle. Scan errors are all reported and stop the cycle
 * before parsing; a parse error is reported on its own.
 */
export function runSource(source: string, log: Logger, options: RunOptions = {}): number {
  const { tokens, scanErrors, result } = parseExpression(source)
  log.debug(`scanned ${tokens.length} tokens, ${scanErrors.length} errors`)

  if (options.tokens) {
    for (const token of tokens) log.print(formatToken(token))
  }

  for (const error of scanErrors) log.error(formatScanError(error))
  if (result === undefined) return EXIT_DATAERR

  if (!result.ok) {
    log.error(formatParseError(result.error))
    return EXIT_DATAERR
  }

  log.print(options.json ? JSON.stringify(result.value, null, 2) : render(result.value))
  return EXIT_OK
}

export async function runFile(
  path: string,
  log: Logger,
  options: RunOptions = {},
): Promise<number> {
  let source: string
  try {
    source = await readFile(path, 'utf8')
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    log.error(`Could not read '${path}': ${reason}`)
    return EXIT_NOINPUT
  }
  log.debug(`read ${source.length} characters from ${path}`)
  return runSource(source, log, options)
}

/**
 * Read lines until end of input. Errors are reported and the prompt goes on;
 * the exit code is always EXIT_OK.
 */
export async function runPrompt(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  log: Logger,
  options: RunOptions = {},
): Promise<number> {
  const rl = createInterface({ input, output, prompt: '> ', crlfDelay: Infinity })
  rl.prompt()
  for await (const raw of rl) {
    const line = raw.replace(/[\r\n]+$/, '')
    if (line.trim() !== '') {
      runSource(line, log, options)
    }
    rl.prompt()
  }
  return EXIT_OK
}

export interface MainIO {
  env: NodeJS.ProcessEnv
  stdin: NodeJS.ReadableStream
  stdout: NodeJS.WritableStream
  sink?: LogSink
}

export async function main(argv: readonly string[], io: MainIO): Promise<number> {
  const sink = io.sink ?? consoleSink
  const parsed = parseArgs(argv)
  if (!parsed.ok) {
    sink.err(`kestrel: ${parsed.error}`)
    sink.err(USAGE)
    return EXIT_USAGE
  }

  const { file, verbose, options } = parsed.value
  const log = new Logger({ level: verbose ? 'debug' : levelFromEnv(io.env), sink })
  if (file === undefined) {
    return runPrompt(io.stdin, io.stdout, log, options)
  }
  return runFile(file, log, options)
}
