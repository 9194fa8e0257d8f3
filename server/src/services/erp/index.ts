export { ErpClient, type ErpClientDeps, type Sleep } from './client.js';
export { ErpSessionManager, parseSetCookie, sessionTtlMinutes, type SessionManagerDeps } from './sessionManager.js';
export { buildBaseUrl, entityPath, serializeODataParams } from './http.js';
export type {
    ConnectionTestResult,
    ErpConnectionConfig,
    ErpRequester,
    ErpResponseBody,
    ErpSession,
    HttpMethod,
    SecretProvider,
} from './types.js';
