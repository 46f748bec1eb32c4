/**
 * @groundcheck/core - Honesty verification for graph-grounded answers
 *
 * Every claim is checked against the Core graph service before it is stated:
 * - Confirmed with an evidence path: reported as a FACT
 * - Partially supported: reported as an INFERENCE with its confidence
 * - Not supported or unreachable: reported as UNKNOWN, never guessed
 *
 * Each verification is appended to an audit trail.
 */

export * from './utils/index.js';
export * from './transport/index.js';
export * from './grounding/index.js';
export * from './honesty/index.js';
export * from './client/index.js';
export * from './dispatcher/index.js';
export { HonestySession, type SessionOptions } from './session.js';
