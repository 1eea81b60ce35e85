import {ListEntryHistoryRequestSchema, type ListEntryHistoryRequest} from '@keyserver-rest/schemas'
import {z} from 'zod'

import {parseQuery} from '../../http'
import {requireUrlVariable} from '../urlVariables'
import {USER_ID_VARIABLE, pageSizeQueryParam, uint64QueryParam} from './params'
import type {ParameterParserInput, RouteBinding} from './types'

const EntryHistoryQuerySchema = z.object({
  start_epoch: uint64QueryParam,
  page_size: pageSizeQueryParam
})

export const parseEntryHistoryParameters = ({
  message,
  match,
  searchParams
}: ParameterParserInput<ListEntryHistoryRequest>) => {
  message.user_id = requireUrlVariable(match, USER_ID_VARIABLE)

  const query = parseQuery({searchParams, schema: EntryHistoryQuerySchema})
  if (query.start_epoch !== undefined) {
    message.start_epoch = query.start_epoch
  }
  if (query.page_size !== undefined) {
    message.page_size = query.page_size
  }
}

export const listEntryHistoryV2Route: RouteBinding<'listEntryHistoryV2'> = {
  kind: 'listEntryHistoryV2',
  method: 'GET',
  path: `/v2/users/:${USER_ID_VARIABLE}/history`,
  schema: ListEntryHistoryRequestSchema,
  createMessage: () => ListEntryHistoryRequestSchema.parse({}),
  parseParameters: parseEntryHistoryParameters,
  timestampFields: [],
  handler: ({backend, context, message}) => backend.listEntryHistory(context, message)
}
