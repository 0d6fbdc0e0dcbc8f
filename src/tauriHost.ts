import { convertFileSrc } from '@tauri-apps/api/core';
import { LogicalPosition } from '@tauri-apps/api/dpi';
import { emitTo } from '@tauri-apps/api/event';
import { Menu, MenuItem, PredefinedMenuItem } from '@tauri-apps/api/menu';
import { appConfigDir, join } from '@tauri-apps/api/path';
import { TrayIcon } from '@tauri-apps/api/tray';
import { WebviewWindow } from '@tauri-apps/api/webviewWindow';
import { currentMonitor, primaryMonitor, type Monitor } from '@tauri-apps/api/window';
import { open } from '@tauri-apps/plugin-dialog';
import { exists, mkdir, readTextFile, writeTextFile } from '@tauri-apps/plugin-fs';
import { exit } from '@tauri-apps/plugin-process';
import { PET_VIEW_EVENT } from './bridge';
import type { ConfigFile } from './config';
import type { DesktopHost, PetWindow, PetWindowOptions } from './host';
import { createLogger } from './logger';
import { APP_NAME, type MenuEntry } from './menus';
import type { WorkArea } from './roster';

export const CONFIG_FILE_NAME = 'familiar-config.json';
export const TRAY_ID = 'main';

const FALLBACK_WORK_AREA: WorkArea = { x: 0, y: 0, width: 1280, height: 720 };

const log = createLogger('tauri-host');

/** Bundled animations are app-relative paths; anything the user picked is absolute. */
export function isAbsolutePath(path: string): boolean {
  return path.startsWith('/') || path.startsWith('\\') || /^[a-zA-Z]:[\\/]/.test(path);
}

export function toAnimationSource(path: string): string {
  return isAbsolutePath(path) ? convertFileSrc(path) : `/${path.replace(/^\.?\//, '')}`;
}

/** The monitor's usable area (taskbar and dock excluded) in logical pixels. */
export function toWorkArea(monitor: Pick<Monitor, 'workArea' | 'scaleFactor'>): WorkArea {
  const position = monitor.workArea.position.toLogical(monitor.scaleFactor);
  const size = monitor.workArea.size.toLogical(monitor.scaleFactor);
  return {
    x: Math.round(position.x),
    y: Math.round(position.y),
    width: Math.round(size.width),
    height: Math.round(size.height),
  };
}

async function buildMenu<C extends string>(
  entries: MenuEntry<C>[],
  onSelect: (command: C) => void,
): Promise<Menu> {
  const items = await Promise.all(
    entries.map((entry) =>
      entry.kind === 'separator'
        ? PredefinedMenuItem.new({ item: 'Separator' })
        : MenuItem.new({
            text: entry.label,
            enabled: entry.enabled,
            action: () => onSelect(entry.command),
          }),
    ),
  );
  return Menu.new({ items });
}

function waitUntilCreated(webview: WebviewWindow): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    webview.once('tauri://created', () => resolve()).catch(reject);
    webview
      .once('tauri://error', (event) => reject(new Error(String(event.payload))))
      .catch(reject);
  });
}

const configFile: ConfigFile = {
  read: async () => {
    const path = await join(await appConfigDir(), CONFIG_FILE_NAME);
    if (!(await exists(path))) {
      return null;
    }
    return readTextFile(path);
  },
  write: async (text) => {
    const dir = await appConfigDir();
    await mkdir(dir, { recursive: true });
    await writeTextFile(await join(dir, CONFIG_FILE_NAME), text);
  },
};

export function createTauriHost(): DesktopHost {
  const petWindows = new Map<string, WebviewWindow>();

  const openPetWindow = async (options: PetWindowOptions): Promise<PetWindow> => {
    const webview = new WebviewWindow(options.id, {
      url: 'pet.html',
      title: APP_NAME,
      x: options.x,
      y: options.y,
      width: options.size,
      height: options.size,
      decorations: false,
      transparent: true,
      alwaysOnTop: true,
      resizable: false,
      skipTaskbar: true,
      shadow: false,
      focus: false,
    });
    await waitUntilCreated(webview);
    petWindows.set(options.id, webview);

    return {
      id: options.id,
      moveTo: (x, y) => webview.setPosition(new LogicalPosition(x, y)),
      render: (view) => emitTo(webview.label, PET_VIEW_EVENT, view),
      close: async () => {
        petWindows.delete(options.id);
        await webview.close();
      },
    };
  };

  return {
    configFile,

    workArea: async () => {
      const monitor = (await primaryMonitor()) ?? (await currentMonitor());
      if (!monitor) {
        log.warn('No monitor reported, using a fallback work area');
        return FALLBACK_WORK_AREA;
      }
      return toWorkArea(monitor);
    },

    animationExists: async (path) => {
      try {
        if (isAbsolutePath(path)) {
          return await exists(path);
        }
        const response = await fetch(toAnimationSource(path), { method: 'HEAD' });
        return response.ok;
      } catch (error) {
        log.debug('Animation check failed', { path, error: String(error) });
        return false;
      }
    },

    animationSource: toAnimationSource,

    openPetWindow,

    popupMenu: async <C extends string>(
      petId: string,
      entries: MenuEntry<C>[],
      onSelect: (command: C) => void,
    ) => {
      const webview = petWindows.get(petId);
      if (!webview) {
        return;
      }
      const menu = await buildMenu(entries, onSelect);
      await menu.popup(undefined, webview);
    },

    installTray: async <C extends string>(
      entries: MenuEntry<C>[],
      tooltip: string,
      onSelect: (command: C) => void,
    ) => {
      const menu = await buildMenu(entries, onSelect);
      const tray = await TrayIcon.getById(TRAY_ID);
      if (tray) {
        await tray.setMenu(menu);
        await tray.setTooltip(tooltip);
        return;
      }
      await TrayIcon.new({ id: TRAY_ID, menu, tooltip });
    },

    pickAnimationFiles: async () => {
      const selected = await open({
        title: 'Select GIF files',
        multiple: true,
        directory: false,
        filters: [{ name: 'GIF Images', extensions: ['gif'] }],
      });
      if (selected === null) {
        return [];
      }
      return Array.isArray(selected) ? selected : [selected];
    },

    quit: () => exit(0),
  };
}
