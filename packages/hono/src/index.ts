export { getLaunchId, ltiLaunch, type LTILaunchVariables } from './ltiLaunch/index.js';
export { jwksRouteHandler, loginRouteHandler, type LTIRouteOptions } from './ltiRoutes/index.js';
