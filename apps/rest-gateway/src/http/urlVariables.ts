import {gatewayError} from '../errors'

/**
 * Path template variables bound by the router for one request, already
 * percent-decoded.
 */
export type RouteMatch = {
  readonly variables: Readonly<Record<string, string>>
}

export type UrlVariableLookup = {found: true; value: string} | {found: false}

const ROUTER_DECODE_FAILURE_PREFIX = 'Failed to decode param'

export const createRouteMatch = (params: Readonly<Record<string, unknown>>): RouteMatch => {
  const variables: Record<string, string> = {}
  for (const [name, value] of Object.entries(params)) {
    if (typeof value === 'string') {
      variables[name] = value
    }
  }

  return Object.freeze({variables: Object.freeze(variables)})
}

export const extractUrlVariable = (match: RouteMatch | undefined, variableName: string): UrlVariableLookup => {
  if (!match || !Object.hasOwn(match.variables, variableName)) {
    return {found: false}
  }

  const value = match.variables[variableName]
  return value === undefined ? {found: false} : {found: true, value}
}

export const requireUrlVariable = (match: RouteMatch | undefined, variableName: string) => {
  const lookup = extractUrlVariable(match, variableName)
  if (!lookup.found) {
    throw gatewayError('path_variable_missing', `Path variable ${variableName} is missing`)
  }

  return lookup.value
}

/**
 * The router percent-decodes path variables before any binding runs and
 * reports a malformed sequence through `next(error)`.
 */
export const isUrlVariableDecodeFailure = (error: unknown) =>
  error instanceof URIError || (error instanceof Error && error.message.startsWith(ROUTER_DECODE_FAILURE_PREFIX))

export const urlVariableDecodeError = () =>
  gatewayError('path_param_invalid', 'Path variable is not valid percent-encoding')
