import { PassThrough } from 'stream'
import { describe, it, expect } from 'vitest'
import { createPrompt } from '../prompt'
import { ConfigError } from '../errors'

describe('createPrompt', () => {
  it('resolves with the trimmed answer', async () => {
    const input = new PassThrough()
    const ask = createPrompt(input, new PassThrough())

    const answer = ask('Overwrite? (y/n): ')
    input.end('  n  \n')

    await expect(answer).resolves.toBe('n')
  })

  it('rejects with ConfigError when input ends without an answer', async () => {
    const input = new PassThrough()
    const ask = createPrompt(input, new PassThrough())

    const answer = ask('Overwrite? (y/n): ')
    input.end()

    await expect(answer).rejects.toThrow(ConfigError)
  })
})
