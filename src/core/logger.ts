import type {SessionLog} from '../types/PPGTypes';
import {PPG_CONFIG} from './PPGConfig';

export interface TaggedLogger {
  debug(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
}

/**
 * `[Tag] event {context}` console lines, debug level gated on
 * `PPG_CONFIG.debug.enabled`. A `hook` takes every level instead.
 */
export function createLogger(tag: string, hook?: SessionLog): TaggedLogger {
  if (hook) {
    return {
      debug: (event, data = {}) => hook(event, data),
      warn: (event, data = {}) => hook(event, {...data, level: 'warn'}),
      error: (event, data = {}) => hook(event, {...data, level: 'error'}),
    };
  }
  return {
    debug: (event, data = {}) => {
      if (PPG_CONFIG.debug.enabled) {
        console.log(`[${tag}] ${event}`, data);
      }
    },
    warn: (event, data = {}) => console.warn(`[${tag}] ${event}`, data),
    error: (event, data = {}) => console.error(`[${tag}] ${event}`, data),
  };
}
