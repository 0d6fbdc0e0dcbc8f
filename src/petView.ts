import { buttonFromDom, type PetInput, type PetView } from './bridge';
import { PET_SIZE } from './petState';

export interface PetViewHandle {
  render: (view: PetView) => void;
  dispose: () => void;
}

/**
 * Draws one pet and forwards the raw pointer gestures to the controller.
 * Moves are only reported while the left button is held, in screen
 * coordinates, so they stay valid while the window follows the pointer.
 */
export function mountPetView(
  root: HTMLElement,
  petId: string,
  send: (input: PetInput) => void,
): PetViewHandle {
  const image = document.createElement('img');
  image.className = 'pet';
  image.alt = '';
  image.draggable = false;
  image.width = PET_SIZE;
  image.height = PET_SIZE;
  root.replaceChildren(image);

  let pressed = false;

  const onPointerMove = (event: PointerEvent): void => {
    if (!pressed || (event.buttons & 1) === 0) {
      return;
    }
    send({ petId, type: 'move', screenX: event.screenX, screenY: event.screenY });
  };

  const onPointerUp = (event: PointerEvent): void => {
    const button = buttonFromDom(event.button);
    if (button === 'left') {
      pressed = false;
    }
    send({ petId, type: 'release', button });
  };

  const onPointerDown = (event: PointerEvent): void => {
    const button = buttonFromDom(event.button);
    if (button === 'left') {
      event.preventDefault();
      pressed = true;
    }
    send({ petId, type: 'press', button, screenX: event.screenX, screenY: event.screenY });
  };

  const onDoubleClick = (event: MouseEvent): void => {
    send({ petId, type: 'double-click', button: buttonFromDom(event.button) });
  };

  const onContextMenu = (event: MouseEvent): void => {
    event.preventDefault();
    send({ petId, type: 'context-menu' });
  };

  root.addEventListener('pointerdown', onPointerDown);
  root.addEventListener('dblclick', onDoubleClick);
  root.addEventListener('contextmenu', onContextMenu);
  window.addEventListener('pointermove', onPointerMove);
  window.addEventListener('pointerup', onPointerUp);

  return {
    render: (view) => {
      if (image.getAttribute('src') !== view.src) {
        image.src = view.src;
      }
      root.style.opacity = String(view.opacity);
      root.style.cursor = view.locked ? 'default' : 'grab';
      root.classList.toggle('locked', view.locked);
      root.classList.toggle('idle', view.idle);
    },
    dispose: () => {
      root.removeEventListener('pointerdown', onPointerDown);
      root.removeEventListener('dblclick', onDoubleClick);
      root.removeEventListener('contextmenu', onContextMenu);
      window.removeEventListener('pointermove', onPointerMove);
      window.removeEventListener('pointerup', onPointerUp);
    },
  };
}
