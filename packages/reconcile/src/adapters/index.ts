import { BusAdapter } from './hardware/bus.js';
import { LedAdapter } from './hardware/led.js';
import { NetworkingAdapter } from './networking.js';
import type { AdapterDeps } from './networking.js';
import { ServicesAdapter } from './services.js';
import type { SystemAdapter } from './types.js';

export { NetworkingAdapter, updateHostsFile } from './networking.js';
export type { AdapterDeps } from './networking.js';
export { ServicesAdapter } from './services.js';
export { LedAdapter, modeFromTrigger, observedMode } from './hardware/led.js';
export { BusAdapter, REBOOT_WARNING, readBus } from './hardware/bus.js';
export { parseWpaSupplicant, renderWpaSupplicant } from './wpa-supplicant.js';
export type { WpaSupplicantConfig } from './wpa-supplicant.js';
export { ADAPTER_STAGES } from './types.js';
export type { AdapterStage, AppliedChange, ApplyOutcome, SystemAdapter } from './types.js';

/** The adapter set of the supported device family, in stage order. */
export function createDefaultAdapters(deps: AdapterDeps): SystemAdapter[] {
  return [
    new NetworkingAdapter(deps),
    new ServicesAdapter(deps),
    new LedAdapter(deps),
    new BusAdapter(deps),
  ];
}
