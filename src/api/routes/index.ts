export { registerPeerRoutes } from './peer';
export { registerExtractionRoutes } from './extraction';
