import { describe, it, expect } from 'vitest'
import { createLogger, inductionLogger } from '../lib/logger.js'

const FIXED = new Date('2024-03-01T12:00:00.000Z')

function capture() {
  const lines: string[] = []
  return { lines, write: (line: string) => { lines.push(line) } }
}

describe('createLogger', () => {
  it('writes one JSON line per entry with ts, level and msg', () => {
    const out = capture()
    const logger = createLogger('info', { write: out.write, now: () => FIXED })

    logger.info('dataset loaded', { examples: 12 })

    expect(out.lines).toEqual([
      '{"ts":"2024-03-01T12:00:00.000Z","level":"info","msg":"dataset loaded","examples":12}\n',
    ])
  })

  it('drops entries below the threshold', () => {
    const out = capture()
    const logger = createLogger('warn', { write: out.write, now: () => FIXED })

    logger.debug('split')
    logger.info('tree built')
    logger.warn('more than two labels')
    logger.error('failed')

    expect(out.lines.map((line) => JSON.parse(line).level)).toEqual(['warn', 'error'])
  })
})

describe('inductionLogger', () => {
  it('forwards induction events as debug entries named after the event type', () => {
    const out = capture()
    const log = inductionLogger<string>(createLogger('debug', { write: out.write, now: () => FIXED }))

    log({ type: 'leaf', depth: 2, branch: 'false', verdict: true, size: 3 })

    expect(JSON.parse(out.lines[0] ?? '')).toEqual({
      ts: '2024-03-01T12:00:00.000Z',
      level: 'debug',
      msg: 'leaf',
      depth: 2,
      branch: 'false',
      verdict: true,
      size: 3,
    })
  })
})
