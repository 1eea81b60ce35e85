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

import {AppError, type ErrorStatus} from './errors'

export const backendErrorCodes = [
  'invalid_argument',
  'not_found',
  'already_exists',
  'permission_denied',
  'unauthenticated',
  'failed_precondition',
  'resource_exhausted',
  'unimplemented',
  'unavailable',
  'deadline_exceeded',
  'internal'
] as const

export type BackendErrorCode = (typeof backendErrorCodes)[number]

const BACKEND_ERROR_STATUS: Record<BackendErrorCode, ErrorStatus> = {
  invalid_argument: 400,
  not_found: 404,
  already_exists: 409,
  permission_denied: 403,
  unauthenticated: 401,
  failed_precondition: 400,
  resource_exhausted: 429,
  unimplemented: 501,
  unavailable: 503,
  deadline_exceeded: 504,
  internal: 500
}

/**
 * Raised by backend implementations. The dispatch pipeline maps the code to an
 * HTTP status and keeps the message.
 */
export class BackendError extends Error {
  public readonly code: BackendErrorCode

  public constructor({code, message}: {code: BackendErrorCode; message: string}) {
    super(message)
    this.name = 'BackendError'
    this.code = code
  }
}

export const isBackendError = (value: unknown): value is BackendError => value instanceof BackendError

export const backendErrorStatus = (code: BackendErrorCode): ErrorStatus => BACKEND_ERROR_STATUS[code]

export const toAppError = (error: BackendError) =>
  new AppError({code: error.code, message: error.message, status: backendErrorStatus(error.code)})

export type RequestContext = {
  correlationId: string
  requestId: string
  method: string
  route: string
}

export type KeyServerBackend = {
  getEntry: (context: RequestContext, request: GetEntryRequest) => Promise<GetEntryResponse>
  hkpLookup: (context: RequestContext, request: HkpLookupRequest) => Promise<HttpBody>
  listEntryHistory: (context: RequestContext, request: ListEntryHistoryRequest) => Promise<ListEntryHistoryResponse>
  updateEntry: (context: RequestContext, request: UpdateEntryRequest) => Promise<UpdateEntryResponse>
  listSEH: (context: RequestContext, request: ListSEHRequest) => Promise<ListSEHResponse>
  listUpdate: (context: RequestContext, request: ListUpdateRequest) => Promise<ListUpdateResponse>
  listSteps: (context: RequestContext, request: ListStepsRequest) => Promise<ListStepsResponse>
}
