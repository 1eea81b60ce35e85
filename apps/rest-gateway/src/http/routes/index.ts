import type {Request, Response} from 'express'

import {createRouteHandler, type DispatchRuntime} from '../dispatch'
import {listSehV2Route, listStepsV2Route, listUpdateV2Route} from './auditLogRoutes'
import {listEntryHistoryV2Route} from './entryHistoryRoute'
import {getEntryV1Route, getEntryV2Route} from './getEntryRoutes'
import {hkpLookupRoute} from './hkpLookupRoute'
import type {HttpMethod, KeyServerRouteKind, RouteBinding, RouteBindingTable} from './types'
import {updateEntryV2Route} from './updateEntryRoute'

export type RegisteredRoute = {
  readonly kind: KeyServerRouteKind
  readonly method: HttpMethod
  readonly path: string
  readonly createHandler: (runtime: DispatchRuntime) => (request: Request, response: Response) => Promise<void>
}

export const registerRoute = <K extends KeyServerRouteKind>(binding: RouteBinding<K>): RegisteredRoute =>
  Object.freeze({
    kind: binding.kind,
    method: binding.method,
    path: binding.path,
    createHandler: (runtime: DispatchRuntime) => createRouteHandler({binding, runtime})
  })

export const routeBindingTable: RouteBindingTable = Object.freeze({
  getEntryV1: getEntryV1Route,
  hkpLookup: hkpLookupRoute,
  getEntryV2: getEntryV2Route,
  listEntryHistoryV2: listEntryHistoryV2Route,
  updateEntryV2: updateEntryV2Route,
  listSehV2: listSehV2Route,
  listUpdateV2: listUpdateV2Route,
  listStepsV2: listStepsV2Route
})

const registeredByKind: {readonly [K in KeyServerRouteKind]: RegisteredRoute} = {
  getEntryV1: registerRoute(routeBindingTable.getEntryV1),
  hkpLookup: registerRoute(routeBindingTable.hkpLookup),
  getEntryV2: registerRoute(routeBindingTable.getEntryV2),
  listEntryHistoryV2: registerRoute(routeBindingTable.listEntryHistoryV2),
  updateEntryV2: registerRoute(routeBindingTable.updateEntryV2),
  listSehV2: registerRoute(routeBindingTable.listSehV2),
  listUpdateV2: registerRoute(routeBindingTable.listUpdateV2),
  listStepsV2: registerRoute(routeBindingTable.listStepsV2)
}

export const routeBindings: readonly RegisteredRoute[] = Object.freeze(Object.values(registeredByKind))

export * from './auditLogRoutes'
export * from './entryHistoryRoute'
export * from './getEntryRoutes'
export * from './hkpLookupRoute'
export * from './params'
export * from './types'
export * from './updateEntryRoute'
