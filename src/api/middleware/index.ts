export { errorHandler, createError } from './errorHandler';
export { createBearerAuth, readBearerToken, tokensMatch } from './auth';
