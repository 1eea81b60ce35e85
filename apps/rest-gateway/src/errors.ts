import type {BackendErrorCode} from './backend'

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 415 | 429 | 500 | 501 | 503 | 504

const GATEWAY_ERROR_STATUS = {
  path_variable_missing: 400,
  path_param_invalid: 400,
  query_invalid: 400,
  timestamp_invalid: 400,
  request_body_invalid: 400,
  request_body_invalid_json: 400,
  request_body_schema_invalid: 400,
  request_body_too_large: 400,
  content_type_invalid: 415,
  route_not_found: 404,
  internal_error: 500
} as const satisfies Record<string, ErrorStatus>

/** Failures raised by the gateway itself, before or after the backend call. */
export type GatewayErrorCode = keyof typeof GATEWAY_ERROR_STATUS

export type AppErrorCode = GatewayErrorCode | BackendErrorCode

export class AppError extends Error {
  public readonly code: AppErrorCode
  public readonly status: ErrorStatus

  public constructor({code, message, status}: {code: AppErrorCode; message: string; status: ErrorStatus}) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.status = status
  }
}

export const gatewayErrorStatus = (code: GatewayErrorCode): ErrorStatus => GATEWAY_ERROR_STATUS[code]

export const gatewayError = (code: GatewayErrorCode, message: string) =>
  new AppError({code, message, status: gatewayErrorStatus(code)})

export const isAppError = (value: unknown): value is AppError => value instanceof AppError
