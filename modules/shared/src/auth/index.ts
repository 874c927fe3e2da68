/**
 * OAuth Server - Authentication Utilities
 *
 * Challenge computation for client authentication failures.
 *
 * @module shared/auth
 */

export {
    detectAuthScheme,
    buildChallenge,
} from './auth-scheme';
