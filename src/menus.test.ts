import { describe, expect, it } from 'vitest';
import { buildPetMenu, buildTrayMenu, type MenuEntry, type PetMenuCommand } from './menus';

function enabledOf(entries: MenuEntry<PetMenuCommand>[], command: PetMenuCommand): boolean | null {
  for (const entry of entries) {
    if (entry.kind === 'item' && entry.command === command) {
      return entry.enabled;
    }
  }
  return null;
}

describe('buildPetMenu', () => {
  it('lists the pet actions in order', () => {
    const labels = buildPetMenu(false, 2).map((entry) => (entry.kind === 'item' ? entry.label : '---'));
    expect(labels).toEqual([
      'Lock movement',
      'Change animation…',
      'Add pet',
      'Remove this pet',
      '---',
      'Quit Familiar',
    ]);
  });

  it('offers to unlock a locked pet', () => {
    const [first] = buildPetMenu(true, 1);
    expect(first).toEqual({ kind: 'item', command: 'toggle-lock', label: 'Unlock movement', enabled: true });
  });

  it('disables removing the last pet', () => {
    const entries = buildPetMenu(false, 1);
    expect(enabledOf(entries, 'remove-pet')).toBe(false);
    expect(enabledOf(entries, 'add-pet')).toBe(true);
  });

  it('disables adding past three pets', () => {
    const entries = buildPetMenu(false, 3);
    expect(enabledOf(entries, 'add-pet')).toBe(false);
    expect(enabledOf(entries, 'remove-pet')).toBe(true);
  });
});

describe('buildTrayMenu', () => {
  it('shows, hides and quits', () => {
    expect(buildTrayMenu()).toEqual([
      { kind: 'item', command: 'show', label: 'Show Familiar', enabled: true },
      { kind: 'item', command: 'hide', label: 'Hide Familiar', enabled: true },
      { kind: 'separator' },
      { kind: 'item', command: 'quit', label: 'Quit Familiar', enabled: true },
    ]);
  });
});
