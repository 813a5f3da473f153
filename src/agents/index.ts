/**
 * agents/index.ts: Barrel export for the stateful layer.
 *
 * `middleware/` holds stateless page-level helpers (element resolution,
 * the action queue).  `agents/` holds the modules that reason about the
 * session as a whole:
 *   • Login State Detector   URL and marker heuristics
 *   • Session Store          cookie + metadata persistence
 *   • Authenticator          login state machine, browser ownership
 *   • Navigation Controller  search / open-result on a live session
 */

export { LoginStateDetector } from './loginStateDetector';
export type { LoginStateDetectorOptions } from './loginStateDetector';

export { SessionStore, COOKIES_FILE, METADATA_FILE } from './sessionStore';
export type { SessionStoreOptions, SaveResult, ClearResult } from './sessionStore';

export { Authenticator, withAuthenticator, describeFailure } from './authenticator';
export type { AuthenticatorDeps, StartResult, SessionRun, TransportFailure } from './authenticator';

export { NavigationController, describeNavigationFailure } from './navigationController';
export type { NavigationControllerDeps } from './navigationController';
