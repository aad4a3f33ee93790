import type { ExtensionCatalog } from './types.js';
import { createPingExtension } from './builtin/ping.js';
import { createStatusExtension } from './builtin/status.js';
import { createTrackingExtension } from './builtin/tracking.js';

/** Extensions shipped with the bot, loaded at startup in this order. */
export const BUILTIN_EXTENSIONS: ExtensionCatalog = new Map([
  ['ping', createPingExtension],
  ['tracking', createTrackingExtension],
  ['status', createStatusExtension],
]);
