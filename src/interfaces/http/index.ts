export { default as earningsRoutes } from './earnings-routes.js';
