import { describe, it, expect } from 'vitest'
import {
  COMMAND_ARITY,
  encodeAuthPrefix,
  encodeRequestLine,
  parseReplyLine,
  PrintAssembler,
  RequestCommand,
} from '../../../shared/edit-protocol.js'

describe('edit protocol', () => {
  it('declares an arity for every request command', () => {
    for (const command of RequestCommand.options) {
      expect(COMMAND_ARITY[command]).toBeGreaterThanOrEqual(0)
    }
    expect(COMMAND_ARITY['-tty']).toBe(2)
    expect(COMMAND_ARITY['-nowait']).toBe(0)
  })

  describe('encodeRequestLine', () => {
    it('quotes arguments and terminates the line', () => {
      const line = encodeRequestLine([
        { command: '-nowait' },
        { command: '-file', args: ['/tmp/my file'] },
        { command: '-eval', args: ['-1'] },
      ])
      expect(line).toBe('-nowait -file /tmp/my&_file -eval &-1 \n')
    })

    it('keeps an empty last argument', () => {
      expect(encodeRequestLine([{ command: '-eval', args: [''] }])).toBe('-eval  \n')
    })

    it('sends the auth key unquoted', () => {
      expect(encodeAuthPrefix('key&with-dash')).toBe('-auth key&with-dash ')
    })
  })

  describe('parseReplyLine', () => {
    it('reads the pid greeting', () => {
      expect(parseReplyLine('-emacs-pid 4242')).toEqual({ type: 'pid', pid: 4242 })
    })

    it('keeps print payloads quoted', () => {
      expect(parseReplyLine('-print a&_b')).toEqual({ type: 'print', text: 'a&_b', final: true })
      expect(parseReplyLine('-print-nonl a&&')).toEqual({ type: 'print', text: 'a&&', final: false })
    })

    it('unquotes error messages', () => {
      expect(parseReplyLine('-error Authentication&_failed')).toEqual({ type: 'error', message: 'Authentication failed' })
    })

    it('recognizes the window system notice', () => {
      expect(parseReplyLine('-window-system-unsupported ')).toEqual({ type: 'window-system-unsupported' })
    })

    it('marks unknown lines', () => {
      expect(parseReplyLine('-emacs-pid nope')).toEqual({ type: 'unknown', raw: '-emacs-pid nope' })
      expect(parseReplyLine('-bogus')).toEqual({ type: 'unknown', raw: '-bogus' })
    })
  })

  describe('PrintAssembler', () => {
    it('joins chunks before unquoting', () => {
      const assembler = new PrintAssembler()
      expect(assembler.push({ type: 'print', text: 'hello&', final: false })).toBeNull()
      expect(assembler.push({ type: 'print', text: '_world', final: true })).toBe('hello world')
    })

    it('flushes an unterminated run', () => {
      const assembler = new PrintAssembler()
      assembler.push({ type: 'print', text: 'partial&_text', final: false })
      expect(assembler.flush()).toBe('partial text')
      expect(assembler.flush()).toBeNull()
    })
  })
})
