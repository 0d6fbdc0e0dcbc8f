export interface Point {
  x: number;
  y: number;
}

export interface PetState {
  id: string;
  activeAnimation: string;
  currentAnimation: string;
  idle: boolean;
  locked: boolean;
  dragging: boolean;
  dragOffset: Point;
  x: number;
  y: number;
  opacity: number;
  persistPosition: boolean;
}

export interface PetOptions {
  opacity?: number;
  persistPosition?: boolean;
}

export type PointerButton = 'left' | 'middle' | 'right';

export const PET_SIZE = 250;
export const IDLE_TIMEOUT_MS = 15_000;

export function createPetState(
  id: string,
  animation: string,
  position: Point,
  options: PetOptions = {},
): PetState {
  return {
    id,
    activeAnimation: animation,
    currentAnimation: animation,
    idle: false,
    locked: false,
    dragging: false,
    dragOffset: { x: 0, y: 0 },
    x: position.x,
    y: position.y,
    opacity: options.opacity ?? 1,
    persistPosition: options.persistPosition === true,
  };
}

export function setActiveAnimation(pet: PetState, animation: string): PetState {
  return {
    ...pet,
    activeAnimation: animation,
    currentAnimation: animation,
    idle: false,
  };
}

export function enterIdle(pet: PetState, idleAnimation: string | null): PetState {
  if (!idleAnimation || pet.idle) {
    return pet;
  }
  return { ...pet, idle: true, currentAnimation: idleAnimation };
}

export function exitIdle(pet: PetState): PetState {
  if (!pet.idle) {
    return pet;
  }
  return { ...pet, idle: false, currentAnimation: pet.activeAnimation };
}

export function toggleLock(pet: PetState): PetState {
  return { ...pet, locked: !pet.locked, dragging: false };
}

/** A left press: wakes the pet and, unless it is locked, grabs it where the pointer is. */
export function pressPet(pet: PetState, pointer: Point): PetState {
  const awake = exitIdle(pet);
  if (awake.locked) {
    return awake;
  }
  return {
    ...awake,
    dragging: true,
    dragOffset: { x: pointer.x - awake.x, y: pointer.y - awake.y },
  };
}

export function dragPet(pet: PetState, pointer: Point): PetState {
  if (!pet.dragging || pet.locked) {
    return pet;
  }
  return {
    ...pet,
    x: pointer.x - pet.dragOffset.x,
    y: pointer.y - pet.dragOffset.y,
  };
}

export function releasePet(pet: PetState): PetState {
  if (!pet.dragging) {
    return pet;
  }
  return { ...pet, dragging: false };
}

export function setOpacity(pet: PetState, opacity: number): PetState {
  return { ...pet, opacity: Math.max(0, Math.min(1, opacity)) };
}

export function setPersistPosition(pet: PetState, persistPosition: boolean): PetState {
  return { ...pet, persistPosition };
}
