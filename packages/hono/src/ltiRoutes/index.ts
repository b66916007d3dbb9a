// route exports
export { jwksRouteHandler } from './routes/jwks.route.js';
export { loginRouteHandler } from './routes/login.route.js';
export type { LTIRouteOptions } from './routeOptions.js';
