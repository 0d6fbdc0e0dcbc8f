import type { PointerButton } from './petState';

// Wire contract between the controller webview and the pet windows.
// Pet windows broadcast PET_INPUT_EVENT; the controller answers each pet
// with PET_VIEW_EVENT addressed to that window's label.

export const PET_INPUT_EVENT = 'pet:input';
export const PET_VIEW_EVENT = 'pet:view';

export type PetInput =
  | { petId: string; type: 'ready' }
  | { petId: string; type: 'press'; button: PointerButton; screenX: number; screenY: number }
  | { petId: string; type: 'move'; screenX: number; screenY: number }
  | { petId: string; type: 'release'; button: PointerButton }
  | { petId: string; type: 'double-click'; button: PointerButton }
  | { petId: string; type: 'context-menu' };

export interface PetView {
  src: string;
  opacity: number;
  locked: boolean;
  idle: boolean;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== 'object') {
    return null;
  }
  return value as Record<string, unknown>;
}

function toButton(value: unknown): PointerButton | null {
  if (value === 'left' || value === 'middle' || value === 'right') {
    return value;
  }
  return null;
}

function toCoordinate(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/** DOM `MouseEvent.button` to the names used on the wire. */
export function buttonFromDom(button: number): PointerButton {
  if (button === 1) {
    return 'middle';
  }
  if (button === 2) {
    return 'right';
  }
  return 'left';
}

export function parsePetInput(raw: unknown): PetInput | null {
  const record = asRecord(raw);
  if (!record || typeof record.petId !== 'string' || record.petId.length === 0) {
    return null;
  }
  const petId = record.petId;

  switch (record.type) {
    case 'ready':
      return { petId, type: 'ready' };
    case 'context-menu':
      return { petId, type: 'context-menu' };
    case 'press': {
      const button = toButton(record.button);
      const screenX = toCoordinate(record.screenX);
      const screenY = toCoordinate(record.screenY);
      if (!button || screenX === null || screenY === null) {
        return null;
      }
      return { petId, type: 'press', button, screenX, screenY };
    }
    case 'move': {
      const screenX = toCoordinate(record.screenX);
      const screenY = toCoordinate(record.screenY);
      if (screenX === null || screenY === null) {
        return null;
      }
      return { petId, type: 'move', screenX, screenY };
    }
    case 'release':
    case 'double-click': {
      const button = toButton(record.button);
      if (!button) {
        return null;
      }
      return { petId, type: record.type, button };
    }
    default:
      return null;
  }
}

export function parsePetView(raw: unknown): PetView | null {
  const record = asRecord(raw);
  if (!record || typeof record.src !== 'string') {
    return null;
  }
  const opacity = toCoordinate(record.opacity);
  if (opacity === null) {
    return null;
  }
  return {
    src: record.src,
    opacity,
    locked: record.locked === true,
    idle: record.idle === true,
  };
}
