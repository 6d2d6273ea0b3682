import * as path from 'path'
import { describe, it, expect } from 'vitest'
import { parseArgs, buildConfig, cleanInputPath, DEFAULT_OUTPUT_FILE, DEFAULT_DELAY_MS } from '../config'
import { ConfigError } from '../errors'
import { DEFAULT_USER_AGENT } from '../utils'

describe('parseArgs', () => {
  it('reads --key=value flags and the -y switch', () => {
    expect(
      parseArgs(['--input=urls.csv', '--delay=0', '-y', '--user-agent=test-agent', 'stray'])
    ).toEqual({
      inputFile: 'urls.csv',
      urlColumn: undefined,
      outputFile: undefined,
      overwrite: true,
      concurrency: undefined,
      delayMs: '0',
      timeout: undefined,
      userAgent: 'test-agent',
    })
  })
})

describe('buildConfig', () => {
  it('applies defaults', () => {
    expect(buildConfig(parseArgs([]), 'urls.csv')).toEqual({
      inputFile: 'urls.csv',
      urlColumn: 'URL',
      outputFile: path.resolve(DEFAULT_OUTPUT_FILE),
      overwrite: false,
      concurrency: 1,
      delayMs: DEFAULT_DELAY_MS,
      timeout: 0,
      userAgent: DEFAULT_USER_AGENT,
    })
  })

  it('parses numeric flags', () => {
    const config = buildConfig(
      parseArgs(['--concurrency=3', '--delay=0', '--timeout=15000', '--column=Link']),
      'urls.csv'
    )
    expect(config.concurrency).toBe(3)
    expect(config.delayMs).toBe(0)
    expect(config.timeout).toBe(15000)
    expect(config.urlColumn).toBe('Link')
  })

  it('rejects non-numeric and out-of-range values', () => {
    expect(() => buildConfig(parseArgs(['--delay=soon']), 'urls.csv')).toThrow(ConfigError)
    expect(() => buildConfig(parseArgs(['--concurrency=0']), 'urls.csv')).toThrow(
      '--concurrency must be at least 1, got 0'
    )
  })

  it('rejects an empty input path', () => {
    expect(() => buildConfig(parseArgs([]), '  ""  ')).toThrow('No input file provided.')
  })
})

describe('cleanInputPath', () => {
  it('strips surrounding quotes from a pasted path', () => {
    expect(cleanInputPath(' "/home/me/My Files/urls.csv" ')).toBe('/home/me/My Files/urls.csv')
  })
})
