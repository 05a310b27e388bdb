/**
 * Tessera Client
 * The runtime behind server-emitted page scripts
 *
 * Page scripts call `Tessera.state`, `Tessera.computed`, `Tessera.effect`
 * and `Tessera.batch`; this module provides them and installs the
 * `Tessera` global when loaded in a browser.
 */

import { state, computed, effect, batch, disposeAll, activeEffects } from "./signals";

export { state, computed, effect, batch, disposeAll, activeEffects };

/** Name of the global the page scripts reference */
export const GLOBAL_NAME = "Tessera";

/**
 * Tessera global object for use in page scripts
 */
const Tessera = {
  state,
  computed,
  effect,
  batch,
  disposeAll,
};

export type TesseraRuntime = typeof Tessera;

/**
 * Attach the runtime to `target` under the global name.
 * Returns the installed runtime.
 */
export function install(target: object): TesseraRuntime {
  Reflect.set(target, GLOBAL_NAME, Tessera);
  return Tessera;
}

// Expose globally for page scripts
if (typeof window !== "undefined") {
  install(window);
}

export default Tessera;
