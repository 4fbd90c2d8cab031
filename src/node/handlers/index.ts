export { createRoutes } from './routes'
export { createApiServer, startApiServer } from './server'
export type { ApiServerOptions, RunningServer, StartApiServerOptions } from './server'
export type { ApiResponse, Route, RouteContext, RouteTable } from './http'
