import {Readable} from 'node:stream'

import {z} from 'zod'
import {describe, expect, it, vi} from 'vitest'

import {isAppError} from '../errors'
import {decodeJsonMessage, extractCorrelationId, parseQuery, readBodyBuffer, sendBody, sendError, sendJson} from '../http'

const makeResponse = () => {
  const writeHead = vi.fn()
  const end = vi.fn()
  return {
    writeHead,
    end
  }
}

const MessageSchema = z
  .object({
    name: z.string().default(''),
    count: z.number().int().default(0)
  })
  .strict()

describe('rest-gateway http helpers', () => {
  it('reads string and binary chunks into one buffer', async () => {
    const body = await readBodyBuffer({
      request: Readable.from(['ab', Buffer.from('cd', 'utf8')]),
      maxBodyBytes: 16
    })

    expect(body.toString('utf8')).toBe('abcd')
  })

  it('enforces request body size limits', async () => {
    try {
      await readBodyBuffer({request: Readable.from(['a'.repeat(200)]), maxBodyBytes: 100})
      throw new Error('expected body size failure')
    } catch (error) {
      expect(isAppError(error)).toBe(true)
      if (isAppError(error)) {
        expect(error.code).toBe('request_body_too_large')
        expect(error.status).toBe(400)
      }
    }
  })

  it('rejects non-byte chunks', async () => {
    await expect(readBodyBuffer({request: Readable.from([{}]), maxBodyBytes: 16})).rejects.toMatchObject({
      code: 'request_body_invalid'
    })
  })

  it('keeps the message as is for an empty body', () => {
    const message = {name: 'from-path', count: 2}

    expect(
      decodeJsonMessage({raw: Buffer.alloc(0), contentType: undefined, schema: MessageSchema, message})
    ).toBe(message)
  })

  it('treats blank and empty object bodies as empty whatever the content type', () => {
    const message = {name: 'from-path', count: 2}

    for (const raw of ['  ', '{}', '\n{ }\n']) {
      expect(
        decodeJsonMessage({raw: Buffer.from(raw, 'utf8'), contentType: 'text/plain', schema: MessageSchema, message}),
        raw
      ).toBe(message)
    }
  })

  it('merges body fields over the message', () => {
    expect(
      decodeJsonMessage({
        raw: Buffer.from('{"count": 5}', 'utf8'),
        contentType: 'application/json; charset=utf-8',
        schema: MessageSchema,
        message: {name: 'from-path', count: 2}
      })
    ).toEqual({name: 'from-path', count: 5})
  })

  it('fails closed for invalid content-type, invalid json, and invalid schema', () => {
    const decode = (raw: string, contentType = 'application/json') => () =>
      decodeJsonMessage({raw: Buffer.from(raw, 'utf8'), contentType, schema: MessageSchema, message: {name: '', count: 0}})

    expect(decode('{"count": 1}', 'text/plain')).toThrowError('Content-Type must be application/json')
    expect(decode('{nope')).toThrowError('Request body contains invalid JSON')
    expect(decode('null')).toThrowError('Request body must be a JSON object')
    expect(decode('{"count": "many"}')).toThrowError(/^count: /u)
  })

  it('parses query strings and reports the failing parameter', () => {
    const schema = z.object({limit: z.coerce.number().int().gte(1)})

    expect(parseQuery({searchParams: new URLSearchParams('limit=3'), schema})).toEqual({limit: 3})

    try {
      parseQuery({searchParams: new URLSearchParams('limit=0'), schema})
      throw new Error('expected query failure')
    } catch (error) {
      expect(error).toMatchObject({code: 'query_invalid', status: 400})
      expect(error).toHaveProperty('message', expect.stringMatching(/^limit: /u))
    }
  })

  it('uses a provided correlation id and falls back to a UUID', () => {
    expect(extractCorrelationId({headers: {'x-correlation-id': ' corr-1 '}} as never)).toBe('corr-1')
    expect(extractCorrelationId({headers: {'x-correlation-id': 'x'.repeat(129)}} as never)).toMatch(
      /^[0-9a-f-]{36}$/u
    )
    expect(extractCorrelationId({headers: {}} as never)).toMatch(/^[0-9a-f-]{36}$/u)
  })

  it('writes JSON with security headers and the correlation id', () => {
    const response = makeResponse()

    sendJson({response: response as never, status: 200, correlationId: 'corr-2', payload: {status: 'ok'}})

    expect(response.writeHead).toHaveBeenCalledWith(200, {
      'x-content-type-options': 'nosniff',
      'x-frame-options': 'DENY',
      'referrer-policy': 'no-referrer',
      'cross-origin-resource-policy': 'same-origin',
      'cache-control': 'no-store',
      'content-type': 'application/json; charset=utf-8',
      'content-length': '15',
      'x-correlation-id': 'corr-2'
    })
    expect(response.end).toHaveBeenCalledWith(Buffer.from('{"status":"ok"}', 'utf8'))
  })

  it('writes raw bodies with their content type', () => {
    const response = makeResponse()

    sendBody({
      response: response as never,
      status: 200,
      correlationId: 'corr-3',
      contentType: 'application/pgp-keys',
      body: 'armored'
    })

    expect(response.writeHead).toHaveBeenCalledWith(
      200,
      expect.objectContaining({'content-type': 'application/pgp-keys', 'content-length': '7'})
    )
  })

  it('writes the error envelope', () => {
    const response = makeResponse()

    sendError({
      response: response as never,
      status: 404,
      error: 'not_found',
      message: 'No entry for user alice',
      correlationId: 'corr-4'
    })

    expect(response.writeHead).toHaveBeenCalledWith(404, expect.objectContaining({'x-correlation-id': 'corr-4'}))
    const body = response.end.mock.calls[0]?.[0] as Buffer
    expect(JSON.parse(body.toString('utf8'))).toEqual({
      error: 'not_found',
      message: 'No entry for user alice',
      correlation_id: 'corr-4'
    })
  })
})
