import { EventEmitter } from 'eventemitter3';
import type { EngineEvents } from '../types.js';

/** Typed emitter for engine lifecycle events. One instance per process, passed in. */
export class EngineEmitter extends EventEmitter<EngineEvents> {}
