import { PhysicalPosition, PhysicalSize } from '@tauri-apps/api/dpi';
import { describe, expect, it, vi } from 'vitest';
import { clampToWorkArea, defaultPetPosition } from './roster';
import { isAbsolutePath, toAnimationSource, toWorkArea } from './tauriHost';

vi.mock('@tauri-apps/api/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@tauri-apps/api/core')>();
  return {
    ...actual,
    convertFileSrc: (path: string) => `asset://localhost/${encodeURIComponent(path)}`,
  };
});

describe('isAbsolutePath', () => {
  it('tells picked files from bundled ones', () => {
    expect(isAbsolutePath('/home/me/cat.gif')).toBe(true);
    expect(isAbsolutePath('C:\\pets\\cat.gif')).toBe(true);
    expect(isAbsolutePath('d:/pets/cat.gif')).toBe(true);
    expect(isAbsolutePath('animations/familiar.gif')).toBe(false);
    expect(isAbsolutePath('./animations/familiar.gif')).toBe(false);
  });
});

describe('toAnimationSource', () => {
  it('serves bundled animations from the app root', () => {
    expect(toAnimationSource('animations/familiar.gif')).toBe('/animations/familiar.gif');
    expect(toAnimationSource('./animations/familiar.gif')).toBe('/animations/familiar.gif');
  });

  it('serves picked files through the asset protocol', () => {
    expect(toAnimationSource('/home/me/cat.gif')).toBe('asset://localhost/%2Fhome%2Fme%2Fcat.gif');
  });
});

describe('toWorkArea', () => {
  it('converts the usable area to logical pixels', () => {
    expect(
      toWorkArea({
        workArea: {
          position: new PhysicalPosition(3840, 0),
          size: new PhysicalSize(2560, 1441),
        },
        scaleFactor: 2,
      }),
    ).toEqual({ x: 1920, y: 0, width: 1280, height: 721 });
  });

  it('leaves the taskbar out so pets stay above it', () => {
    const workArea = toWorkArea({
      workArea: {
        position: new PhysicalPosition(0, 0),
        size: new PhysicalSize(1920, 1032),
      },
      scaleFactor: 1,
    });

    expect(workArea).toEqual({ x: 0, y: 0, width: 1920, height: 1032 });
    expect(clampToWorkArea({ x: 0, y: 2000 }, workArea)).toEqual({ x: 0, y: 782 });
    expect(defaultPetPosition(workArea)).toEqual({ x: 30, y: 732 });
  });
});
