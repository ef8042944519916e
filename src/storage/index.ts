/**
 * Storage exports.
 */

export {
  SessionLog,
  buildSessionLogEntry,
  type SessionLogConfig,
  type SessionLogEntry,
  type SessionTurnInfo,
} from './session-log.js';
