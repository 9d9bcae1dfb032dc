import type { InteractionEffects } from '../types/duopane-split';
import { log } from '../services/logger';

/** Trigger the haptic effect without waiting on it. */
export function fireHaptic(effects: InteractionEffects, component: string): void {
  if (!effects.haptic) return;
  try {
    void Promise.resolve(effects.haptic()).catch((error: unknown) => {
      log.debug(component, 'Haptic feedback failed', { error: String(error) });
    });
  } catch (error) {
    log.debug(component, 'Haptic feedback failed', { error: String(error) });
  }
}
