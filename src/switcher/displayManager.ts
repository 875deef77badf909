/**
 * Display manager transition planning
 */

import type { DisplayManagerTransition, Profile } from "./types.js";

/**
 * Plan which display manager service to disable and which to enable
 * @param args - Configuration arguments
 * @param args.current - Active profile
 * @param args.target - Profile to switch to
 *
 * @returns Empty transition when both profiles use the same service (or none)
 */
export const planDisplayManagerTransition = (args: {
  current: Profile;
  target: Profile;
}): DisplayManagerTransition => {
  const { current, target } = args;

  if (current.displayManager === target.displayManager) {
    return { disable: null, enable: null };
  }

  return {
    disable: current.displayManager,
    enable: target.displayManager,
  };
};

/**
 * @param transition - Planned transition
 *
 * @returns True if nothing needs to change
 */
export const isEmptyTransition = (
  transition: DisplayManagerTransition,
): boolean => {
  return transition.disable == null && transition.enable == null;
};
