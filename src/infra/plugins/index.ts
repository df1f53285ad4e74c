export { registerCors, isOriginAllowed, parseAllowedOrigins } from './cors.js';
