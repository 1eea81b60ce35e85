import {HkpLookupRequestSchema, type HkpLookupRequest} from '@keyserver-rest/schemas'
import {z} from 'zod'

import {parseQuery} from '../../http'
import {stringQueryParam} from './params'
import type {ParameterParserInput, RouteBinding} from './types'

const HkpLookupQuerySchema = z.object({
  op: stringQueryParam,
  search: stringQueryParam,
  options: stringQueryParam
})

// HKP clients may omit any of the three parameters.
export const parseHkpLookupParameters = ({searchParams, message}: ParameterParserInput<HkpLookupRequest>) => {
  const query = parseQuery({searchParams, schema: HkpLookupQuerySchema})
  message.op = query.op ?? message.op
  message.search = query.search ?? message.search
  message.options = query.options ?? message.options
}

export const hkpLookupRoute: RouteBinding<'hkpLookup'> = {
  kind: 'hkpLookup',
  method: 'GET',
  path: '/v1/hkp/lookup',
  schema: HkpLookupRequestSchema,
  createMessage: () => HkpLookupRequestSchema.parse({}),
  parseParameters: parseHkpLookupParameters,
  timestampFields: [],
  handler: ({backend, context, message}) => backend.hkpLookup(context, message),
  present: result => ({contentType: result.content_type, body: result.body})
}
