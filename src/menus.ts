import { canAddPet, canRemovePet } from './roster';

export type PetMenuCommand = 'toggle-lock' | 'change-animation' | 'add-pet' | 'remove-pet' | 'quit';
export type TrayCommand = 'show' | 'hide' | 'quit';

export type MenuEntry<C extends string> =
  | { kind: 'item'; command: C; label: string; enabled: boolean }
  | { kind: 'separator' };

export const APP_NAME = 'Familiar';

export function buildPetMenu(locked: boolean, petCount: number): MenuEntry<PetMenuCommand>[] {
  return [
    {
      kind: 'item',
      command: 'toggle-lock',
      label: locked ? 'Unlock movement' : 'Lock movement',
      enabled: true,
    },
    { kind: 'item', command: 'change-animation', label: 'Change animation…', enabled: true },
    { kind: 'item', command: 'add-pet', label: 'Add pet', enabled: canAddPet(petCount) },
    {
      kind: 'item',
      command: 'remove-pet',
      label: 'Remove this pet',
      enabled: canRemovePet(petCount),
    },
    { kind: 'separator' },
    { kind: 'item', command: 'quit', label: `Quit ${APP_NAME}`, enabled: true },
  ];
}

export function buildTrayMenu(): MenuEntry<TrayCommand>[] {
  return [
    { kind: 'item', command: 'show', label: `Show ${APP_NAME}`, enabled: true },
    { kind: 'item', command: 'hide', label: `Hide ${APP_NAME}`, enabled: true },
    { kind: 'separator' },
    { kind: 'item', command: 'quit', label: `Quit ${APP_NAME}`, enabled: true },
  ];
}
