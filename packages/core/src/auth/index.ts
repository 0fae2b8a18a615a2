export { OriginAuthenticator } from './origin-authenticator.js';
export type {
  AuthFailureReason,
  AuthFailed,
  VerifyResult,
  OpenResult,
  SealParams,
  OriginAuthenticatorOptions,
} from './origin-authenticator.js';
