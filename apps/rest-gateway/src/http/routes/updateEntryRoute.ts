import {UpdateEntryRequestSchema, type UpdateEntryRequest} from '@keyserver-rest/schemas'

import {requireUrlVariable} from '../urlVariables'
import {USER_ID_VARIABLE} from './params'
import type {ParameterParserInput, RouteBinding} from './types'

export const KEY_CREATION_TIME_FIELD = 'creation_time'

export const parseUpdateEntryParameters = ({message, match}: ParameterParserInput<UpdateEntryRequest>) => {
  message.user_id = requireUrlVariable(match, USER_ID_VARIABLE)
}

/**
 * `PUT /v2/users/:user_id` carries the signed key in the body. Its
 * `signed_key.key.creation_time` arrives as an RFC3339 string and is rewritten
 * to a `{seconds, nanos}` object before decoding.
 */
export const updateEntryV2Route: RouteBinding<'updateEntryV2'> = {
  kind: 'updateEntryV2',
  method: 'PUT',
  path: `/v2/users/:${USER_ID_VARIABLE}`,
  schema: UpdateEntryRequestSchema,
  createMessage: () => UpdateEntryRequestSchema.parse({}),
  parseParameters: parseUpdateEntryParameters,
  timestampFields: [KEY_CREATION_TIME_FIELD],
  handler: ({backend, context, message}) => backend.updateEntry(context, message)
}
