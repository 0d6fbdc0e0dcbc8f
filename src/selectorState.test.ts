import { describe, expect, it } from 'vitest';
import {
  createSelectorState,
  deleteSelected,
  displayName,
  importAnimations,
  selectAnimation,
  selectedAnimation,
  setOpacityPercent,
  setTargetPet,
} from './selectorState';

const paths = ['animations/a.gif', 'animations/b.gif', 'animations/c.gif'];

describe('createSelectorState', () => {
  it('selects the first entry', () => {
    const state = createSelectorState(paths, 80, 'pet-1');
    expect(state.selectedIndex).toBe(0);
    expect(selectedAnimation(state)).toBe('animations/a.gif');
    expect(state.targetPetId).toBe('pet-1');
    expect(state.opacityPercent).toBe(80);
  });

  it('selects nothing when the list is empty', () => {
    const state = createSelectorState([], 100, null);
    expect(state.selectedIndex).toBe(-1);
    expect(selectedAnimation(state)).toBeNull();
  });

  it('copies the list', () => {
    const source = ['x.gif'];
    const state = createSelectorState(source, 100, null);
    source.push('y.gif');
    expect(state.animations).toEqual(['x.gif']);
  });
});

describe('selectAnimation', () => {
  it('selects a valid index', () => {
    const state = selectAnimation(createSelectorState(paths, 100, null), 2);
    expect(selectedAnimation(state)).toBe('animations/c.gif');
  });

  it('clears the selection for an out-of-range index', () => {
    const state = createSelectorState(paths, 100, null);
    expect(selectAnimation(state, 3).selectedIndex).toBe(-1);
    expect(selectAnimation(state, -4).selectedIndex).toBe(-1);
  });
});

describe('importAnimations', () => {
  it('appends new paths and skips known ones', () => {
    const state = importAnimations(createSelectorState(paths, 100, null), [
      'animations/b.gif',
      '/home/user/new.gif',
      '/home/user/new.gif',
    ]);
    expect(state.animations).toEqual([...paths, '/home/user/new.gif']);
    expect(state.selectedIndex).toBe(0);
  });

  it('returns the same state when nothing is new', () => {
    const state = createSelectorState(paths, 100, null);
    expect(importAnimations(state, ['animations/a.gif'])).toBe(state);
  });
});

describe('deleteSelected', () => {
  it('keeps the selection at the same index', () => {
    const state = deleteSelected(selectAnimation(createSelectorState(paths, 100, null), 1));
    expect(state.animations).toEqual(['animations/a.gif', 'animations/c.gif']);
    expect(state.selectedIndex).toBe(1);
  });

  it('moves the selection up when the last entry is removed', () => {
    const state = deleteSelected(selectAnimation(createSelectorState(paths, 100, null), 2));
    expect(state.selectedIndex).toBe(1);
  });

  it('clears the selection when the list empties', () => {
    const state = deleteSelected(createSelectorState(['only.gif'], 100, null));
    expect(state.animations).toEqual([]);
    expect(state.selectedIndex).toBe(-1);
  });

  it('is a no-op without a selection', () => {
    const state = selectAnimation(createSelectorState(paths, 100, null), 9);
    expect(deleteSelected(state)).toBe(state);
  });
});

describe('setOpacityPercent', () => {
  it('rounds and clamps to 30..100', () => {
    const state = createSelectorState(paths, 100, null);
    expect(setOpacityPercent(state, 55.6).opacityPercent).toBe(56);
    expect(setOpacityPercent(state, 5).opacityPercent).toBe(30);
    expect(setOpacityPercent(state, 250).opacityPercent).toBe(100);
  });

  it('clamps the initial value too', () => {
    expect(createSelectorState(paths, 10, null).opacityPercent).toBe(30);
  });
});

describe('setTargetPet', () => {
  it('switches the edited pet', () => {
    expect(setTargetPet(createSelectorState(paths, 100, 'pet-1'), 'pet-2').targetPetId).toBe('pet-2');
  });
});

describe('displayName', () => {
  it('returns the base name for either separator', () => {
    expect(displayName('/home/user/pets/cat.gif')).toBe('cat.gif');
    expect(displayName('C:\\Users\\me\\dog.gif')).toBe('dog.gif');
    expect(displayName('plain.gif')).toBe('plain.gif');
  });
});
