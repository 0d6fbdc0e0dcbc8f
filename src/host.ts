import type { PetView } from './bridge';
import type { ConfigFile } from './config';
import type { MenuEntry } from './menus';
import type { WorkArea } from './roster';
import type { SelectorState } from './selectorState';

export interface PetWindowOptions {
  id: string;
  x: number;
  y: number;
  size: number;
}

/** A pet's native window, as seen from the controller. */
export interface PetWindow {
  readonly id: string;
  moveTo: (x: number, y: number) => Promise<void>;
  render: (view: PetView) => Promise<void>;
  close: () => Promise<void>;
}

/** Everything the controller needs from the desktop. */
export interface DesktopHost {
  configFile: ConfigFile;
  workArea: () => Promise<WorkArea>;
  animationExists: (path: string) => Promise<boolean>;
  /** URL the webviews can load the animation from. */
  animationSource: (path: string) => string;
  openPetWindow: (options: PetWindowOptions) => Promise<PetWindow>;
  popupMenu: <C extends string>(
    petId: string,
    entries: MenuEntry<C>[],
    onSelect: (command: C) => void,
  ) => Promise<void>;
  installTray: <C extends string>(
    entries: MenuEntry<C>[],
    tooltip: string,
    onSelect: (command: C) => void,
  ) => Promise<void>;
  pickAnimationFiles: () => Promise<string[]>;
  quit: () => Promise<void>;
}

export interface SelectorViewModel extends SelectorState {
  names: string[];
  previewSrc: string | null;
  previewMissing: boolean;
  targetLabel: string;
}

/** The selector window; rendering is synchronous, visibility is native. */
export interface SelectorSurface {
  render: (model: SelectorViewModel) => void;
  show: () => Promise<void>;
  hide: () => Promise<void>;
}
