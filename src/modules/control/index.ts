/**
 * @fileoverview Public exports for the control server module.
 * @module modules/control
 * @version 1.0.0
 */

export { ControlServer } from './ControlServer';
export type { ControlServerConfig, ListeningAddress, ResponseEnvelope } from './types';
