import { describe, it, expect } from 'vitest'
import { maskSecrets } from '../../../src/util/redact.js'

describe('maskSecrets', () => {
  it('should replace every occurrence of each secret', () => {
    expect(maskSecrets('a=WIF b=WIF c=PW', ['WIF', 'PW'])).toBe(
      'a=[REDACTED] b=[REDACTED] c=[REDACTED]',
    )
  })

  it('should mask a longer secret as a whole when it contains a shorter one', () => {
    expect(maskSecrets('key=ABCDEF', ['ABC', 'ABCDEF'])).toBe('key=[REDACTED]')
  })

  it('should ignore empty secrets', () => {
    expect(maskSecrets('unchanged', [''])).toBe('unchanged')
  })

  it('should accept a custom replacement', () => {
    expect(maskSecrets('--private-key X', ['X'], '[HIDDEN]')).toBe('--private-key [HIDDEN]')
  })
})
