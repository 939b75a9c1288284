import { describe, it, expect } from 'vitest'
import vm from 'vm'
import { describeError, EvaluationError, ServerUnreachable } from '../../../server/errors.js'

describe('describeError', () => {
  it('uses the message of errors from another context', () => {
    let thrown: unknown
    try {
      vm.runInNewContext('throw new TypeError("bad input")')
    } catch (err) {
      thrown = err
    }
    expect(thrown instanceof Error).toBe(false)
    expect(describeError(thrown)).toBe('bad input')
  })

  it('prints other values', () => {
    expect(describeError('plain')).toBe('plain')
    expect(describeError({ code: 7 })).toBe('{"code":7}')
    expect(describeError(new RangeError(''))).toBe('RangeError')
  })
})

describe('EditServerError', () => {
  it('names and codes subclasses', () => {
    const err = new EvaluationError('(car 1)', new Error('wrong-type-argument'))
    expect(err.name).toBe('EvaluationError')
    expect(err.code).toBe('EVALUATION_ERROR')
    expect(err.message).toBe('wrong-type-argument')
  })

  it('includes the cause of an unreachable server', () => {
    const err = new ServerUnreachable('/tmp/s', new Error('ECONNREFUSED'))
    expect(err.message).toBe('Cannot reach server at /tmp/s: ECONNREFUSED')
  })
})
