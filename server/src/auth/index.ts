export { requireAuth, requireAdmin, createRequireAuth, getActor, getSessionToken } from './middleware';
export { SessionTokenResolver, extractBearerToken } from './tokenResolver';
export type { AuthResolver } from './tokenResolver';
export {
  AuthorizationService,
  assertAuthorized,
  RESOURCE_ACCESS_DENIED,
} from './authorizationService';
export type { AuthorizationResult, ProtectedResource } from './authorizationService';
