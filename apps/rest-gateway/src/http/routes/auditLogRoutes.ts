import {
  ListSEHRequestSchema,
  ListStepsRequestSchema,
  ListUpdateRequestSchema,
  type ListSEHRequest,
  type ListStepsRequest,
  type ListUpdateRequest
} from '@keyserver-rest/schemas'
import {z} from 'zod'

import {parseQuery} from '../../http'
import {pageSizeQueryParam, uint64QueryParam} from './params'
import type {ParameterParserInput, RouteBinding} from './types'

const EpochPageQuerySchema = z.object({
  start_epoch: uint64QueryParam,
  page_size: pageSizeQueryParam
})

const CommitmentPageQuerySchema = z.object({
  start_commitment_timestamp: uint64QueryParam,
  page_size: pageSizeQueryParam
})

export const parseEpochPageParameters = ({message, searchParams}: ParameterParserInput<ListSEHRequest>) => {
  const query = parseQuery({searchParams, schema: EpochPageQuerySchema})
  message.start_epoch = query.start_epoch ?? message.start_epoch
  message.page_size = query.page_size ?? message.page_size
}

export const parseCommitmentPageParameters = ({
  message,
  searchParams
}: ParameterParserInput<ListUpdateRequest | ListStepsRequest>) => {
  const query = parseQuery({searchParams, schema: CommitmentPageQuerySchema})
  message.start_commitment_timestamp = query.start_commitment_timestamp ?? message.start_commitment_timestamp
  message.page_size = query.page_size ?? message.page_size
}

export const listSehV2Route: RouteBinding<'listSehV2'> = {
  kind: 'listSehV2',
  method: 'GET',
  path: '/v2/seh',
  schema: ListSEHRequestSchema,
  createMessage: () => ListSEHRequestSchema.parse({}),
  parseParameters: parseEpochPageParameters,
  timestampFields: [],
  handler: ({backend, context, message}) => backend.listSEH(context, message)
}

export const listUpdateV2Route: RouteBinding<'listUpdateV2'> = {
  kind: 'listUpdateV2',
  method: 'GET',
  path: '/v2/updates',
  schema: ListUpdateRequestSchema,
  createMessage: () => ListUpdateRequestSchema.parse({}),
  parseParameters: parseCommitmentPageParameters,
  timestampFields: [],
  handler: ({backend, context, message}) => backend.listUpdate(context, message)
}

export const listStepsV2Route: RouteBinding<'listStepsV2'> = {
  kind: 'listStepsV2',
  method: 'GET',
  path: '/v2/steps',
  schema: ListStepsRequestSchema,
  createMessage: () => ListStepsRequestSchema.parse({}),
  parseParameters: parseCommitmentPageParameters,
  timestampFields: [],
  handler: ({backend, context, message}) => backend.listSteps(context, message)
}
