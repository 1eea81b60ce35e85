import {GetEntryRequestSchema, type GetEntryRequest} from '@keyserver-rest/schemas'
import {z} from 'zod'

import {parseQuery} from '../../http'
import {requireUrlVariable} from '../urlVariables'
import {USER_ID_VARIABLE, stringQueryParam, uint64QueryParam} from './params'
import type {ParameterParserInput, RouteBinding, RouteHandlerInput} from './types'

const GetEntryQuerySchema = z.object({
  epoch: uint64QueryParam,
  app_id: stringQueryParam
})

export const parseGetEntryParameters = ({message, match, searchParams}: ParameterParserInput<GetEntryRequest>) => {
  message.user_id = requireUrlVariable(match, USER_ID_VARIABLE)

  const query = parseQuery({searchParams, schema: GetEntryQuerySchema})
  if (query.epoch !== undefined) {
    message.epoch = query.epoch
  }
  if (query.app_id !== undefined) {
    message.app_id = query.app_id
  }
}

const handleGetEntry = ({backend, context, message}: RouteHandlerInput<GetEntryRequest>) =>
  backend.getEntry(context, message)

export const getEntryV1Route: RouteBinding<'getEntryV1'> = {
  kind: 'getEntryV1',
  method: 'GET',
  path: `/v1/users/:${USER_ID_VARIABLE}`,
  schema: GetEntryRequestSchema,
  createMessage: () => GetEntryRequestSchema.parse({}),
  parseParameters: parseGetEntryParameters,
  timestampFields: [],
  handler: handleGetEntry
}

export const getEntryV2Route: RouteBinding<'getEntryV2'> = {
  kind: 'getEntryV2',
  method: 'GET',
  path: `/v2/users/:${USER_ID_VARIABLE}`,
  schema: GetEntryRequestSchema,
  createMessage: () => GetEntryRequestSchema.parse({}),
  parseParameters: parseGetEntryParameters,
  timestampFields: [],
  handler: handleGetEntry
}
