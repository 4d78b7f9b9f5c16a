import { describe, it, expect } from 'vitest'
import { getCliArgs } from '../get-cli-args'
import { toSolverIds } from '../commands'
import { BASE_CONFIG, parseActions, validateRunConfig } from '../../conf/run-config'
import { InvalidConfigError, UnknownSolverError } from '../../utils/errors'

describe('getCliArgs', () => {
  it('returns the defaults without arguments', () => {
    expect(getCliArgs([])).toEqual(BASE_CONFIG)
  })

  it('casts flags by the type of their default', () => {
    const config = getCliArgs(['train', '--episodes', '200', '--ucb_alpha', '0.8', '--answers', 'a.txt', '-m', 'first run'])
    expect(config.COMMAND).toBe('train')
    expect(config.EPISODES).toBe(200)
    expect(config.UCB_ALPHA).toBe(0.8)
    expect(config.ANSWERS).toBe('a.txt')
    expect(config.MESSAGE).toBe('first run')
  })

  it('accepts the short solver flag', () => {
    expect(getCliArgs(['run', '-s', 'expected_left']).SOLVER).toBe('expected_left')
  })

  it('rejects unknown flags', () => {
    expect(() => getCliArgs(['--bogus', '1'])).toThrow()
  })

  it('does not mutate the defaults', () => {
    getCliArgs(['--n', '6'])
    expect(BASE_CONFIG.N).toBe(5)
  })
})

describe('validateRunConfig', () => {
  it('accepts the defaults', () => {
    expect(validateRunConfig(BASE_CONFIG).COMMAND).toBe('run')
  })

  it('rejects bad numbers and unknown commands', () => {
    expect(() => validateRunConfig(getCliArgs(['--seed', 'abc']))).toThrow(InvalidConfigError)
    expect(() => validateRunConfig({ ...BASE_CONFIG, COMMAND: 'dance' })).toThrow(/COMMAND/)
  })
})

describe('actions', () => {
  it('splits and checks solver ids', () => {
    expect(parseActions(' entropy, ,letter_freq ')).toEqual(['entropy', 'letter_freq'])
    expect(toSolverIds(['entropy', 'letter_freq'])).toEqual(['entropy', 'letter_freq'])
    expect(() => toSolverIds(['entropy', 'magic'])).toThrow(UnknownSolverError)
  })
})
