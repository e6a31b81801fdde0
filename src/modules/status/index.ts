/**
 * @fileoverview Public exports for the Status Publisher module.
 * @module modules/status
 */

export { StatusPublisher } from './StatusPublisher';
export type { StatusSnapshot, NextEvent } from './types';
