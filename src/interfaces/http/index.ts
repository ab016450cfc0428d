export { default as captureRoutes, CAPTURE_PATH } from './capture-routes.js';
export type { CaptureRoutesOptions } from './capture-routes.js';
export { default as itemRoutes } from './item-routes.js';
export type { ItemRoutesOptions } from './item-routes.js';
