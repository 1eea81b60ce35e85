import type {
  GetEntryRequest,
  GetEntryResponse,
  HkpLookupRequest,
  HttpBody,
  ListEntryHistoryRequest,
  ListEntryHistoryResponse,
  ListSEHRequest,
  ListSEHResponse,
  ListStepsRequest,
  ListStepsResponse,
  ListUpdateRequest,
  ListUpdateResponse,
  UpdateEntryRequest,
  UpdateEntryResponse
} from '@keyserver-rest/schemas'
import type {z} from 'zod'

import type {KeyServerBackend, RequestContext} from '../../backend'
import type {RouteMatch} from '../urlVariables'

export type RouteMessageMap = {
  getEntryV1: GetEntryRequest
  hkpLookup: HkpLookupRequest
  getEntryV2: GetEntryRequest
  listEntryHistoryV2: ListEntryHistoryRequest
  updateEntryV2: UpdateEntryRequest
  listSehV2: ListSEHRequest
  listUpdateV2: ListUpdateRequest
  listStepsV2: ListStepsRequest
}

export type RouteResultMap = {
  getEntryV1: GetEntryResponse
  hkpLookup: HttpBody
  getEntryV2: GetEntryResponse
  listEntryHistoryV2: ListEntryHistoryResponse
  updateEntryV2: UpdateEntryResponse
  listSehV2: ListSEHResponse
  listUpdateV2: ListUpdateResponse
  listStepsV2: ListStepsResponse
}

export type KeyServerRouteKind = keyof RouteMessageMap

export type HttpMethod = 'GET' | 'PUT'

export type ParameterParserInput<TMessage> = {
  message: TMessage
  match: RouteMatch | undefined
  searchParams: URLSearchParams
}

export type RouteHandlerInput<TMessage> = {
  backend: KeyServerBackend
  context: RequestContext
  message: TMessage
}

export type PresentedBody = {
  contentType: string
  body: Buffer | string
}

export type RouteBinding<K extends KeyServerRouteKind> = {
  readonly kind: K
  readonly method: HttpMethod
  readonly path: string
  readonly schema: z.ZodType<RouteMessageMap[K]>
  readonly createMessage: () => RouteMessageMap[K]
  readonly parseParameters: (input: ParameterParserInput<RouteMessageMap[K]>) => void
  readonly timestampFields: readonly string[]
  readonly handler: (input: RouteHandlerInput<RouteMessageMap[K]>) => Promise<RouteResultMap[K]>
  readonly present?: (result: RouteResultMap[K]) => PresentedBody
}

export type RouteBindingTable = {
  readonly [K in KeyServerRouteKind]: RouteBinding<K>
}
