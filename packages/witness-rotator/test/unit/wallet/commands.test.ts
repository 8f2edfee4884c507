import { describe, it, expect } from 'vitest'
import {
  authorizeKeyScript,
  getInfoScript,
  renderArgument,
  renderScript,
  verifyKeyScript,
} from '../../../src/wallet/commands.js'

describe('renderArgument', () => {
  it('should quote strings as JSON literals', () => {
    expect(renderArgument('alice')).toBe('"alice"')
    expect(renderArgument('')).toBe('""')
    expect(renderArgument('say "hi"')).toBe('"say \\"hi\\""')
  })

  it('should write booleans bare', () => {
    expect(renderArgument(true)).toBe('true')
  })
})

describe('renderScript', () => {
  it('should terminate every line with a newline', () => {
    expect(renderScript([['info'], ['quit']])).toBe('info\nquit\n')
  })
})

describe('wallet scripts', () => {
  it('should verify a key by importing it and looking up the witness', () => {
    expect(verifyKeyScript('pw', 'alice', 'test-wif')).toBe(
      'set_password "pw"\n' +
        'unlock "pw"\n' +
        'import_key "alice" "test-wif"\n' +
        'get_witness "alice"\n' +
        'quit\n',
    )
  })

  it('should authorize a new key with a broadcast update_witness', () => {
    expect(authorizeKeyScript('pw', 'alice', 'test-wif', 'https://example.org', 'PUB2')).toBe(
      'set_password "pw"\n' +
        'unlock "pw"\n' +
        'import_key "alice" "test-wif"\n' +
        'update_witness "alice" "https://example.org" "PUB2" true\n' +
        'quit\n',
    )
  })

  it('should keep an empty witness url as an empty string argument', () => {
    expect(authorizeKeyScript('pw', 'alice', 'test-wif', '', 'PUB2')).toContain(
      'update_witness "alice" "" "PUB2" true\n',
    )
  })

  it('should query node info', () => {
    expect(getInfoScript()).toBe('get_info\nquit\n')
  })
})
