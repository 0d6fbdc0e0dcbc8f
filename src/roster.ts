import { PET_SIZE, type Point } from './petState';

export interface WorkArea {
  x: number;
  y: number;
  width: number;
  height: number;
}

export const MAX_PETS = 3;
export const MIN_PETS = 1;
export const PET_SPACING = 20;

const DEFAULT_MARGIN_X = 30;
const DEFAULT_MARGIN_BOTTOM = 50;

export function canAddPet(count: number): boolean {
  return count < MAX_PETS;
}

export function canRemovePet(count: number): boolean {
  return count > MIN_PETS;
}

/** Bottom-left corner of the work area, where a pet with no saved position appears. */
export function defaultPetPosition(workArea: WorkArea): Point {
  return {
    x: workArea.x + DEFAULT_MARGIN_X,
    y: workArea.y + workArea.height - PET_SIZE - DEFAULT_MARGIN_BOTTOM,
  };
}

export function clampToWorkArea(position: Point, workArea: WorkArea, size = PET_SIZE): Point {
  const maxX = Math.max(workArea.x, workArea.x + workArea.width - size);
  const maxY = Math.max(workArea.y, workArea.y + workArea.height - size);
  return {
    x: Math.min(Math.max(position.x, workArea.x), maxX),
    y: Math.min(Math.max(position.y, workArea.y), maxY),
  };
}

/**
 * New pets line up to the right of the first one, one pet width plus spacing
 * per existing pet, without running past the right edge of the work area.
 */
export function nextPetPosition(base: Point, existingCount: number, workArea: WorkArea): Point {
  const offset = existingCount * (PET_SIZE + PET_SPACING);
  return {
    x: Math.min(base.x + offset, workArea.x + workArea.width - PET_SIZE),
    y: base.y,
  };
}
