/**
 * Tests for command error reporting
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { reportCommandError } from '../../src/cli/report.js'
import { EntryNotFoundError } from '../../src/lib/errors.js'

describe('reportCommandError', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should print the message of an unexpected error', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    reportCommandError(new TypeError('boom'), false)

    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(errorSpy.mock.calls[0]?.[0]).toEqual(expect.stringContaining('boom'))
  })

  it('should print the message before the stack under --verbose', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const err = new TypeError('boom')
    reportCommandError(err, true)

    expect(errorSpy).toHaveBeenCalledTimes(2)
    expect(errorSpy.mock.calls[0]?.[0]).toEqual(expect.stringContaining('boom'))
    expect(errorSpy.mock.calls[1]?.[0]).toBe(err.stack)
  })

  it('should print values that are not errors', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    reportCommandError('plain failure', true)

    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(errorSpy.mock.calls[0]?.[0]).toEqual(expect.stringContaining('plain failure'))
  })

  it('should print launcher errors by message', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    reportCommandError(new EntryNotFoundError('abc'), false)

    expect(errorSpy.mock.calls[0]?.[0]).toEqual(expect.stringContaining('Entry "abc" not found'))
  })
})
