import { mkdtempSync, writeFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { PassThrough, Readable } from 'stream'
import {
  EXIT_DATAERR,
  EXIT_NOINPUT,
  EXIT_OK,
  EXIT_USAGE,
  USAGE,
  main,
  parseArgs,
  runSource,
} from '../src/cli/run'
import { Logger, LogSink, levelFromEnv } from '../src/cli/logger'

function capture() {
  const out: string[] = []
  const err: string[] = []
  const sink: LogSink = {
    out: (line) => out.push(line),
    err: (line) => err.push(line),
  }
  return { out, err, sink }
}

function runMain(argv: string[], input = '', env: NodeJS.ProcessEnv = {}) {
  const io = capture()
  const promise = main(argv, {
    env,
    stdin: Readable.from([input]),
    stdout: new PassThrough(),
    sink: io.sink,
  })
  return { ...io, promise }
}

describe('cli', () => {
  describe('parseArgs', () => {
    it('reads flags and a file', () => {
      const parsed = parseArgs(['--tokens', 'a.ks', '--json'])
      expect(parsed).toEqual({
        ok: true,
        value: { file: 'a.ks', verbose: false, options: { tokens: true, json: true } },
      })
    })

    it('rejects unknown options', () => {
      expect(parseArgs(['--fast'])).toEqual({ ok: false, error: "unknown option '--fast'" })
    })

    it('rejects a second file', () => {
      expect(parseArgs(['a.ks', 'b.ks'])).toEqual({ ok: false, error: 'expected at most one file' })
    })
  })

  describe('runSource', () => {
    it('prints the rendered tree', () => {
      const io = capture()
      const code = runSource('(1 + 2) * 3', new Logger({ sink: io.sink }))
      expect(code).toBe(EXIT_OK)
      expect(io.out).toEqual(['( 1 + 2 ) * 3'])
      expect(io.err).toEqual([])
    })

    it('reports every scan error and skips parsing', () => {
      const io = capture()
      const code = runSource('@ + #', new Logger({ sink: io.sink }))
      expect(code).toBe(EXIT_DATAERR)
      expect(io.out).toEqual([])
      expect(io.err).toEqual([
        "[line 1:1] Error: Unexpected character '@'.",
        "[line 1:5] Error: Unexpected character '#'.",
      ])
    })

    it('reports a parse error', () => {
      const io = capture()
      const code = runSource('1 ? 2', new Logger({ sink: io.sink }))
      expect(code).toBe(EXIT_DATAERR)
      expect(io.err).toEqual(["[line 1:6] Error at end: expected ':' but found end of input"])
    })

    it('dumps tokens before the tree', () => {
      const io = capture()
      runSource('-1', new Logger({ sink: io.sink }), { tokens: true })
      expect(io.out).toEqual(['1:1 MINUS "-"', '1:2 NUMBER "1" 1', '1:3 EOF ""', '-1'])
    })

    it('prints JSON on request', () => {
      const io = capture()
      runSource('nil', new Logger({ sink: io.sink }), { json: true })
      expect(JSON.parse(io.out[0])).toEqual({ type: 'Literal', start: 0, end: 3, value: null })
    })

    it('keeps errors quiet at level silent', () => {
      const io = capture()
      const code = runSource('@', new Logger({ level: 'silent', sink: io.sink }))
      expect(code).toBe(EXIT_DATAERR)
      expect(io.err).toEqual([])
    })

    it('logs scan counts at level debug', () => {
      const io = capture()
      runSource('1', new Logger({ level: 'debug', sink: io.sink }))
      expect(io.err).toEqual(['[debug] scanned 2 tokens, 0 errors'])
    })
  })

  describe('main', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'kestrel-'))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    it('runs a file', async () => {
      const file = join(dir, 'ok.ks')
      writeFileSync(file, '1 == 1 ? "yes" : "no"\n')
      const run = runMain([file])
      expect(await run.promise).toBe(EXIT_OK)
      expect(run.out).toEqual(['1 == 1 ? yes : no'])
    })

    it('logs at level debug with --verbose', async () => {
      const file = join(dir, 'one.ks')
      writeFileSync(file, '1\n')
      const run = runMain(['--verbose', file], '', { KESTREL_LOG_LEVEL: 'silent' })
      expect(await run.promise).toBe(EXIT_OK)
      expect(run.out).toEqual(['1'])
      expect(run.err).toEqual([
        `[debug] read 2 characters from ${file}`,
        '[debug] scanned 2 tokens, 0 errors',
      ])
    })

    it('exits with a data error for a file with lexical errors', async () => {
      const file = join(dir, 'bad.ks')
      writeFileSync(file, '1 +\n"never closed')
      const run = runMain([file])
      expect(await run.promise).toBe(EXIT_DATAERR)
      expect(run.err).toEqual(['[line 2:1] Error: Unterminated string.'])
    })

    it('exits with no-input for a missing file', async () => {
      const run = runMain([join(dir, 'missing.ks')])
      expect(await run.promise).toBe(EXIT_NOINPUT)
      expect(run.err).toHaveLength(1)
      expect(run.err[0].startsWith(`Could not read '${join(dir, 'missing.ks')}'`)).toBe(true)
    })

    it('lists every flag in the usage line', () => {
      expect(USAGE).toBe('Usage: kestrel [--tokens] [--json] [--verbose] [file]')
    })

    it('prints usage for bad arguments', async () => {
      const run = runMain(['--nope'])
      expect(await run.promise).toBe(EXIT_USAGE)
      expect(run.err).toEqual(["kestrel: unknown option '--nope'", USAGE])
    })

    it('runs each prompt line independently', async () => {
      const run = runMain([], '1 + 2\r\n\n(3\n!nil\n')
      expect(await run.promise).toBe(EXIT_OK)
      expect(run.out).toEqual(['1 + 2', '!nil'])
      expect(run.err).toEqual(["[line 1:3] Error at end: expected ')' but found end of input"])
    })
  })

  describe('levelFromEnv', () => {
    it('reads KESTREL_LOG_LEVEL', () => {
      expect(levelFromEnv({ KESTREL_LOG_LEVEL: 'DEBUG' })).toBe('debug')
    })

    it('falls back to info', () => {
      expect(levelFromEnv({})).toBe('info')
      expect(levelFromEnv({ KESTREL_LOG_LEVEL: 'loud' })).toBe('info')
    })
  })
})
