import { describe, it, expect, vi } from 'vitest'
import { uniqueOutputPath, resolveOutputPath } from '../output-path'

const existing = (...names: string[]) => {
  const set = new Set(names)
  return (p: string) => set.has(p)
}

describe('uniqueOutputPath', () => {
  it('returns the path itself when free', () => {
    expect(uniqueOutputPath('output.csv', existing())).toBe('output.csv')
  })

  it('appends the first free numeric suffix before the extension', () => {
    expect(uniqueOutputPath('output.csv', existing('output.csv', 'output_1.csv'))).toBe('output_2.csv')
  })

  it('keeps the directory and handles names without extension', () => {
    expect(uniqueOutputPath('/data/out/results', existing('/data/out/results'))).toBe('/data/out/results_1')
  })
})

describe('resolveOutputPath', () => {
  it('does not ask when the file is free', async () => {
    const confirmOverwrite = vi.fn(async () => true)

    const result = await resolveOutputPath('output.csv', { confirmOverwrite, exists: existing() })

    expect(result).toBe('output.csv')
    expect(confirmOverwrite).not.toHaveBeenCalled()
  })

  it('picks a suffixed name when the operator declines', async () => {
    const confirmOverwrite = vi.fn(async () => false)

    const result = await resolveOutputPath('output.csv', {
      confirmOverwrite,
      exists: existing('output.csv', 'output_1.csv'),
    })

    expect(result).toBe('output_2.csv')
    expect(confirmOverwrite).toHaveBeenCalledWith('output.csv')
  })

  it('overwrites when the operator agrees', async () => {
    const result = await resolveOutputPath('output.csv', {
      confirmOverwrite: async () => true,
      exists: existing('output.csv'),
    })

    expect(result).toBe('output.csv')
  })

  it('skips the question when overwrite is preset', async () => {
    const confirmOverwrite = vi.fn(async () => false)

    const result = await resolveOutputPath('output.csv', {
      overwrite: true,
      confirmOverwrite,
      exists: existing('output.csv'),
    })

    expect(result).toBe('output.csv')
    expect(confirmOverwrite).not.toHaveBeenCalled()
  })
})
