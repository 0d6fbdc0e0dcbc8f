import './pet.css';
import { emit } from '@tauri-apps/api/event';
import { getCurrentWebviewWindow } from '@tauri-apps/api/webviewWindow';
import { PET_INPUT_EVENT, PET_VIEW_EVENT, parsePetView, type PetInput } from './bridge';
import { installErrorHandlers, reportError } from './errors';
import { setLogLevel } from './logger';
import { mountPetView } from './petView';

setLogLevel(import.meta.env.DEV ? 'debug' : 'info');
installErrorHandlers(window);

const rootElement = document.getElementById('pet');
if (!(rootElement instanceof HTMLElement)) {
  throw new Error('missing #pet');
}

const petWindow = getCurrentWebviewWindow();
const petId = petWindow.label;

const send = (input: PetInput): void => {
  emit(PET_INPUT_EVENT, input).catch((error: unknown) =>
    reportError(error, 'host', { petId, type: input.type }),
  );
};

const view = mountPetView(rootElement, petId, send);

petWindow
  .listen<unknown>(PET_VIEW_EVENT, (event) => {
    const next = parsePetView(event.payload);
    if (next) {
      view.render(next);
    }
  })
  .then((unlisten) => {
    window.addEventListener(
      'beforeunload',
      () => {
        unlisten();
        view.dispose();
      },
      { once: true },
    );
    send({ petId, type: 'ready' });
  })
  .catch((error: unknown) => reportError(error, 'host', { petId, phase: 'listen' }));
