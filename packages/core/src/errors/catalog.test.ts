import { describe, it, expect } from 'vitest'
import {
  ChrisError,
  RequestError,
  RemoteError,
  EmptyCollectionError,
  TooManyResultsError,
  NotFoundError,
  NotLoggedInError,
  InvalidCubeUrlError,
  InvalidPipelineError,
  UnderfullError,
  OverfullError,
  FileIOError,
} from './catalog.js'

describe('ChrisError', () => {
  it('has correct code, message, and details', () => {
    const err = new ChrisError('SOMETHING', 'Something happened', { a: 1 })

    expect(err.code).toBe('SOMETHING')
    expect(err.message).toBe('Something happened')
    expect(err.details).toEqual({ a: 1 })
    expect(err.name).toBe('ChrisError')
  })

  it('toJSON() returns serializable object', () => {
    const err = new ChrisError('SOMETHING', 'Something happened', {
      field: 'name',
    })
    expect(err.toJSON()).toEqual({
      error: {
        code: 'SOMETHING',
        message: 'Something happened',
        details: { field: 'name' },
      },
    })

    // Omits details when undefined
    const bare = new ChrisError('SOMETHING', 'Something happened')
    expect(bare.toJSON()).toEqual({
      error: { code: 'SOMETHING', message: 'Something happened' },
    })
  })

  it('keeps the cause', () => {
    const cause = new Error('ECONNRESET')
    const err = new RequestError('network', 'http://cube/api/v1/', 'failed', {
      cause,
    })
    expect(err.cause).toBe(cause)
  })
})

describe('subclasses', () => {
  it('map to their codes', () => {
    const cases: Array<{ err: ChrisError; code: string; name: string }> = [
      {
        err: new RequestError('network', 'u', 'm'),
        code: 'REQUEST_FAILED',
        name: 'RequestError',
      },
      {
        err: new RequestError('decode', 'u', 'm'),
        code: 'DECODE_FAILED',
        name: 'RequestError',
      },
      {
        err: new RemoteError(404, 'Not Found', 'u', ''),
        code: 'REMOTE_ERROR',
        name: 'RemoteError',
      },
      {
        err: new EmptyCollectionError(),
        code: 'EMPTY_COLLECTION',
        name: 'EmptyCollectionError',
      },
      {
        err: new TooManyResultsError(2),
        code: 'TOO_MANY_RESULTS',
        name: 'TooManyResultsError',
      },
      { err: new NotFoundError('x'), code: 'NOT_FOUND', name: 'NotFoundError' },
      {
        err: new NotLoggedInError('upload'),
        code: 'NOT_LOGGED_IN',
        name: 'NotLoggedInError',
      },
      {
        err: new InvalidCubeUrlError('u', 'bad'),
        code: 'INVALID_CUBE_URL',
        name: 'InvalidCubeUrlError',
      },
      {
        err: new InvalidPipelineError('no root'),
        code: 'INVALID_PIPELINE',
        name: 'InvalidPipelineError',
      },
      { err: new UnderfullError(3, 2), code: 'UNDERFULL', name: 'UnderfullError' },
      { err: new OverfullError(3), code: 'OVERFULL', name: 'OverfullError' },
      { err: new FileIOError('/tmp/a', 'm'), code: 'FILE_IO', name: 'FileIOError' },
    ]

    for (const { err, code, name } of cases) {
      expect(err).toBeInstanceOf(ChrisError)
      expect(err).toBeInstanceOf(Error)
      expect(err.code).toBe(code)
      expect(err.name).toBe(name)
    }
  })

  it('RemoteError attaches the body verbatim', () => {
    const err = new RemoteError(
      400,
      'Bad Request',
      'http://cube/api/v1/plugins/',
      '{"name":["This field is required."]}',
    )
    expect(err.status).toBe(400)
    expect(err.body).toBe('{"name":["This field is required."]}')
    expect(err.message).toBe(
      '(400 Bad Request): {"name":["This field is required."]}',
    )
  })

  it('RemoteError without body omits the colon', () => {
    expect(new RemoteError(503, 'Service Unavailable', 'u', '').message).toBe(
      '(503 Service Unavailable)',
    )
  })

  it('executor invariant errors report counts', () => {
    expect(new UnderfullError(11, 10).message).toBe(
      'Expected 11 tasks but the source produced only 10',
    )
    expect(new OverfullError(9).details).toEqual({ expected: 9 })
  })
})
