export interface SelectorState {
  animations: string[];
  selectedIndex: number;
  targetPetId: string | null;
  opacityPercent: number;
}

export const OPACITY_PERCENT_MIN = 30;
export const OPACITY_PERCENT_MAX = 100;

function clampPercent(percent: number): number {
  if (!Number.isFinite(percent)) {
    return OPACITY_PERCENT_MAX;
  }
  return Math.max(OPACITY_PERCENT_MIN, Math.min(OPACITY_PERCENT_MAX, Math.round(percent)));
}

function isInRange(animations: string[], index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < animations.length;
}

export function displayName(path: string): string {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1] || path;
}

export function createSelectorState(
  paths: readonly string[],
  opacityPercent: number,
  targetPetId: string | null,
): SelectorState {
  return {
    animations: [...paths],
    selectedIndex: paths.length > 0 ? 0 : -1,
    targetPetId,
    opacityPercent: clampPercent(opacityPercent),
  };
}

export function selectAnimation(state: SelectorState, index: number): SelectorState {
  return {
    ...state,
    selectedIndex: isInRange(state.animations, index) ? index : -1,
  };
}

export function selectedAnimation(state: SelectorState): string | null {
  if (!isInRange(state.animations, state.selectedIndex)) {
    return null;
  }
  return state.animations[state.selectedIndex];
}

export function importAnimations(state: SelectorState, paths: readonly string[]): SelectorState {
  const animations = [...state.animations];
  for (const path of paths) {
    if (!animations.includes(path)) {
      animations.push(path);
    }
  }

  if (animations.length === state.animations.length) {
    return state;
  }
  return { ...state, animations };
}

/** Drops the selected entry from the list only; the file on disk is untouched. */
export function deleteSelected(state: SelectorState): SelectorState {
  const index = state.selectedIndex;
  if (!isInRange(state.animations, index)) {
    return state;
  }

  const animations = state.animations.filter((_, position) => position !== index);
  return {
    ...state,
    animations,
    selectedIndex: animations.length > 0 ? Math.min(index, animations.length - 1) : -1,
  };
}

export function setTargetPet(state: SelectorState, petId: string | null): SelectorState {
  return { ...state, targetPetId: petId };
}

export function setOpacityPercent(state: SelectorState, percent: number): SelectorState {
  return { ...state, opacityPercent: clampPercent(percent) };
}
