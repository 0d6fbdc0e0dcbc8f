import './index.css';
import { listen } from '@tauri-apps/api/event';
import { getCurrentWindow } from '@tauri-apps/api/window';
import { createPetApp } from './app';
import { PET_INPUT_EVENT, parsePetInput } from './bridge';
import { installErrorHandlers, reportError } from './errors';
import { createLogger, setLogLevel } from './logger';
import { mountSelectorView } from './selectorView';
import { createTauriHost } from './tauriHost';

setLogLevel(import.meta.env.DEV ? 'debug' : 'info');
installErrorHandlers(window);

const log = createLogger('main');

const rootElement = document.getElementById('selector');
if (!(rootElement instanceof HTMLElement)) {
  throw new Error('missing #selector');
}

const selectorWindow = getCurrentWindow();

const run = (task: () => Promise<void>, context: Record<string, unknown>): void => {
  task().catch((error: unknown) => reportError(error, 'handler', context));
};

const view = mountSelectorView(rootElement, {
  onSelect: (index) => run(() => app.selectAnimation(index), { action: 'select', index }),
  onApply: () => run(() => app.applySelection(), { action: 'apply' }),
  onImport: () => run(() => app.importAnimations(), { action: 'import' }),
  onDelete: () => run(() => app.deleteSelected(), { action: 'delete' }),
  onOpacity: (percent) => run(() => app.setOpacityPercent(percent), { action: 'opacity', percent }),
});

const app = createPetApp(createTauriHost(), {
  render: view.render,
  show: async () => {
    await selectorWindow.show();
    await selectorWindow.unminimize();
    await selectorWindow.setFocus();
  },
  hide: () => selectorWindow.hide(),
});

// The selector only hides on close; the tray brings it back.
selectorWindow
  .onCloseRequested((event) => {
    event.preventDefault();
    run(() => app.hideSelector(), { action: 'close' });
  })
  .catch((error: unknown) => reportError(error, 'host', { phase: 'close-handler' }));

listen<unknown>(PET_INPUT_EVENT, (event) => {
  const input = parsePetInput(event.payload);
  if (!input) {
    log.warn('Ignoring malformed pet input');
    return;
  }
  run(() => app.handlePetInput(input), { petId: input.petId, type: input.type });
})
  .then(() => app.start())
  .catch((error: unknown) => reportError(error, 'host', { phase: 'start' }));
