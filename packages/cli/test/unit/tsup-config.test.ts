import { describe, it, expect } from 'vitest'
import config from '../../tsup.config.js'

describe('tsup config', () => {
  it('should compile the library into the bin', () => {
    if (typeof config === 'function' || Array.isArray(config)) {
      throw new Error('expected a single options object')
    }
    expect(config.entry).toEqual(['src/bin.ts'])
    expect(config.noExternal).toEqual(['witness-rotator'])
  })
})
